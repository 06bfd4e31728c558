/**
 * Runtime configuration from NEXT_PUBLIC_* env vars.
 * Missing values fall back to the product defaults.
 */

import { z } from "zod";
import { DEFAULT_ANNUAL_RATE_PERCENT } from "@/lib/model/constants";

const AnnualRateSchema = z.coerce.number().finite().positive();

export function getDefaultAnnualRatePercent(
  raw: string | undefined = process.env.NEXT_PUBLIC_DEFAULT_ANNUAL_RATE
): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_ANNUAL_RATE_PERCENT;
  const parsed = AnnualRateSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(
      `[Config] Ignoring NEXT_PUBLIC_DEFAULT_ANNUAL_RATE="${raw}":`,
      parsed.error.issues[0]?.message ?? "invalid value"
    );
    return DEFAULT_ANNUAL_RATE_PERCENT;
  }
  return parsed.data;
}

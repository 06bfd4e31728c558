/**
 * Zod schemas for the 99Pay simulation.
 */

import { z } from "zod";

export const SimulationInputSchema = z.object({
  /** Initial deposit, R$. */
  principal: z.number().finite().positive(),
  /** Horizon in calendar days. No upper bound. */
  days: z.number().int().min(1),
  /** Annual CDI as a percent, e.g. 11.15. */
  annualRatePercent: z.number().finite().positive(),
  /** Percentage points added to the tier-1 multiplier (10 → 120% of CDI). */
  bonusPercent: z.number().finite().min(0).default(0),
});
export type SimulationInput = z.infer<typeof SimulationInputSchema>;
/** Input before defaults are applied (bonusPercent optional). */
export type SimulationInputDraft = z.input<typeof SimulationInputSchema>;

export const DailyRecordSchema = z.object({
  day: z.number().int().min(1),
  startBalance: z.number(),
  tier1Yield: z.number(),
  tier2Yield: z.number(),
  totalYield: z.number(),
  endBalance: z.number(),
});
export type DailyRecord = z.infer<typeof DailyRecordSchema>;

/** Pending sidebar values. null = field left empty. */
export const SimulationFormSchema = z.object({
  principal: z.number().nullable(),
  days: z.number().nullable(),
  annualRatePercent: z.number().nullable(),
  bonusPercent: z.number(),
});
export type SimulationForm = z.infer<typeof SimulationFormSchema>;

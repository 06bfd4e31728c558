import { afterEach, describe, it, expect, vi } from "vitest";
import { getDefaultAnnualRatePercent } from "./config";
import { DEFAULT_ANNUAL_RATE_PERCENT } from "@/lib/model/constants";

describe("getDefaultAnnualRatePercent", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("falls back to the product default when unset", () => {
    expect(getDefaultAnnualRatePercent(undefined)).toBe(DEFAULT_ANNUAL_RATE_PERCENT);
    expect(getDefaultAnnualRatePercent("  ")).toBe(DEFAULT_ANNUAL_RATE_PERCENT);
  });

  it("parses a configured rate", () => {
    expect(getDefaultAnnualRatePercent("14.90")).toBe(14.9);
  });

  it("reads NEXT_PUBLIC_DEFAULT_ANNUAL_RATE by default", () => {
    vi.stubEnv("NEXT_PUBLIC_DEFAULT_ANNUAL_RATE", "13.65");
    expect(getDefaultAnnualRatePercent()).toBe(13.65);
  });

  it.each(["abc", "0", "-2"])("warns and falls back on %s", (raw) => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(getDefaultAnnualRatePercent(raw)).toBe(DEFAULT_ANNUAL_RATE_PERCENT);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe(
      `[Config] Ignoring NEXT_PUBLIC_DEFAULT_ANNUAL_RATE="${raw}":`
    );
  });
});

/**
 * 99Pay projection engine.
 * Daily compounding over a two-bracket CDI schedule, plus the simplified savings comparator.
 * Pure and synchronous: every call recomputes from its own arguments.
 */

import {
  SimulationInputSchema,
  type DailyRecord,
  type SimulationInput,
  type SimulationInputDraft,
} from "@/lib/types/zod";
import {
  DAYS_PER_YEAR,
  TIER1_LIMIT,
  TIER1_BASE_MULTIPLIER,
  TIER2_MULTIPLIER,
  SAVINGS_MONTHLY_RATE,
  SAVINGS_CYCLE_DAYS,
} from "@/lib/model/constants";
import { InvalidInputError } from "./errors";

const SavingsInputSchema = SimulationInputSchema.pick({
  principal: true,
  days: true,
});

/** Validate raw input against the core contract; throws InvalidInputError. */
export function parseSimulationInput(draft: SimulationInputDraft): SimulationInput {
  const parsed = SimulationInputSchema.safeParse(draft);
  if (!parsed.success) {
    throw InvalidInputError.fromZodIssues(parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Effective daily rate that compounds to the annual rate over 365 days.
 * (1 + annual)^(1/365) - 1, not annual / 365.
 */
export function dailyRate(annualRatePercent: number): number {
  const annual = annualRatePercent / 100;
  return Math.pow(1 + annual, 1 / DAYS_PER_YEAR) - 1;
}

/** Tier-1 multiplier over the daily CDI. Bonus is additive in percentage points: 10 → 1.20. */
export function tier1Multiplier(bonusPercent: number = 0): number {
  return TIER1_BASE_MULTIPLIER + bonusPercent / 100;
}

/** Tier-1 display percent of CDI (110 + bonus). */
export function tier1Percent(bonusPercent: number = 0): number {
  return Math.round(TIER1_BASE_MULTIPLIER * 100) + bonusPercent;
}

/** Split a balance into the amount under the tier-1 ceiling and the excess. */
export function splitTiers(balance: number): { tier1Base: number; tier2Base: number } {
  return {
    tier1Base: Math.min(balance, TIER1_LIMIT),
    tier2Base: Math.max(0, balance - TIER1_LIMIT),
  };
}

/**
 * Project the 99Pay balance day by day.
 * Yields accrue on the start-of-day balance only; the new balance applies from the next day.
 */
export function project(
  principal: number,
  days: number,
  annualRatePercent: number,
  bonusPercent: number = 0
): DailyRecord[] {
  parseSimulationInput({ principal, days, annualRatePercent, bonusPercent });

  const rate = dailyRate(annualRatePercent);
  const multiplier = tier1Multiplier(bonusPercent);
  const records: DailyRecord[] = [];
  let balance = principal;

  for (let day = 1; day <= days; day++) {
    const startBalance = balance;
    const { tier1Base, tier2Base } = splitTiers(startBalance);

    const tier1Yield = tier1Base * rate * multiplier;
    const tier2Yield = tier2Base * rate * TIER2_MULTIPLIER;
    const totalYield = tier1Yield + tier2Yield;
    balance = startBalance + totalYield;

    records.push({
      day,
      startBalance,
      tier1Yield,
      tier2Yield,
      totalYield,
      endBalance: balance,
    });
  }

  return records;
}

/**
 * Savings balance for each day (index 0 = day 1).
 * The monthly credit lands at the end of day 30, 60, ... and is already visible on that day.
 */
export function projectSavings(principal: number, days: number): number[] {
  const parsed = SavingsInputSchema.safeParse({ principal, days });
  if (!parsed.success) {
    throw InvalidInputError.fromZodIssues(parsed.error.issues);
  }

  const values: number[] = [];
  let balance = principal;

  for (let day = 1; day <= days; day++) {
    if (day % SAVINGS_CYCLE_DAYS === 0) {
      balance *= 1 + SAVINGS_MONTHLY_RATE;
    }
    values.push(balance);
  }

  return values;
}

/** True when the horizon reaches at least one savings credit. */
export function isSavingsApplicable(days: number): boolean {
  return days >= SAVINGS_CYCLE_DAYS;
}

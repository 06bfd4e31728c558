/**
 * Reduce projection series to the figures shown on the summary cards.
 */

import type { DailyRecord, SimulationInputDraft, SimulationInput } from "@/lib/types/zod";
import { InvalidInputError } from "./errors";
import { VALIDATION_CODES } from "./validation";
import {
  dailyRate,
  isSavingsApplicable,
  parseSimulationInput,
  project,
  projectSavings,
  tier1Multiplier,
} from "./engine";

export interface SeriesSummary {
  finalValue: number;
  totalYield: number;
  /** Percent of principal; null when not applicable (savings below one credit cycle). */
  percentYield: number | null;
}

export interface SimulationSummary {
  product: SeriesSummary;
  /** Same horizon without bonus; null when bonusPercent is 0. */
  baseline: SeriesSummary | null;
  savings: SeriesSummary;
}

export interface SimulationResult {
  input: SimulationInput;
  dailyRate: number;
  tier1Multiplier: number;
  series: DailyRecord[];
  baseline: DailyRecord[] | null;
  savings: number[];
  savingsApplicable: boolean;
  summary: SimulationSummary;
}

function reduce(finalValue: number, principal: number): SeriesSummary {
  const totalYield = finalValue - principal;
  return {
    finalValue,
    totalYield,
    percentYield: (totalYield / principal) * 100,
  };
}

function assertPrincipal(principal: number): void {
  if (!(principal > 0)) {
    throw new InvalidInputError([
      { code: VALIDATION_CODES.INVALID_PRINCIPAL, message: "principal: must be greater than 0" },
    ]);
  }
}

export function summarizeProjection(series: DailyRecord[], principal: number): SeriesSummary {
  assertPrincipal(principal);
  const last = series[series.length - 1];
  if (!last) {
    throw new InvalidInputError([
      { code: VALIDATION_CODES.EMPTY_SERIES, message: "projection series is empty" },
    ]);
  }
  return reduce(last.endBalance, principal);
}

export function summarizeSavings(savings: number[], principal: number): SeriesSummary {
  assertPrincipal(principal);
  const last = savings[savings.length - 1];
  if (last === undefined) {
    throw new InvalidInputError([
      { code: VALIDATION_CODES.EMPTY_SERIES, message: "savings series is empty" },
    ]);
  }
  const summary = reduce(last, principal);
  if (!isSavingsApplicable(savings.length)) {
    return { ...summary, percentYield: null };
  }
  return summary;
}

/**
 * Run one full simulation: product projection, optional zero-bonus baseline, savings comparator.
 * The baseline is an independent projection, not derived from the bonus series.
 */
export function runSimulation(draft: SimulationInputDraft): SimulationResult {
  const input = parseSimulationInput(draft);
  const { principal, days, annualRatePercent, bonusPercent } = input;

  const series = project(principal, days, annualRatePercent, bonusPercent);
  const baseline =
    bonusPercent > 0 ? project(principal, days, annualRatePercent, 0) : null;
  const savings = projectSavings(principal, days);

  return {
    input,
    dailyRate: dailyRate(annualRatePercent),
    tier1Multiplier: tier1Multiplier(bonusPercent),
    series,
    baseline,
    savings,
    savingsApplicable: isSavingsApplicable(days),
    summary: {
      product: summarizeProjection(series, principal),
      baseline: baseline ? summarizeProjection(baseline, principal) : null,
      savings: summarizeSavings(savings, principal),
    },
  };
}

/**
 * Named simulation inputs shared by the model, export and store tests.
 */

import type { SimulationInput } from "@/lib/types/zod";

const CDI = 11.15;

function createInput(overrides?: Partial<SimulationInput>): SimulationInput {
  return {
    principal: 5000,
    days: 1,
    annualRatePercent: CDI,
    bonusPercent: 0,
    ...overrides,
  };
}

/** Whole balance inside tier 1. */
export function getAtTierLimit(): SimulationInput {
  return createInput();
}

/** Half the balance in each tier. */
export function getStraddlingTiers(): SimulationInput {
  return createInput({ principal: 10_000 });
}

/** Tier 1 at 120% of CDI. */
export function getWithBonus(): SimulationInput {
  return createInput({ principal: 10_000, days: 365, bonusPercent: 10 });
}

/** Shorter than one savings cycle. */
export function getShortHorizon(): SimulationInput {
  return createInput({ principal: 1000, days: 20 });
}

/** Exactly one savings credit, on the last day. */
export function getOneSavingsCycle(): SimulationInput {
  return createInput({ principal: 1000, days: 30 });
}

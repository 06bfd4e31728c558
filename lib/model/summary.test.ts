import { describe, it, expect } from "vitest";
import { runSimulation, summarizeProjection, summarizeSavings } from "./summary";
import { project, projectSavings } from "./engine";
import { InvalidInputError } from "./errors";
import {
  getOneSavingsCycle,
  getShortHorizon,
  getWithBonus,
} from "@/fixtures/scenarios";

describe("summarizeProjection", () => {
  it("reduces the last record against the principal", () => {
    const summary = summarizeProjection(project(10_000, 365, 11.15), 10_000);
    expect(summary.finalValue).toBeCloseTo(11_047.9676024, 5);
    expect(summary.totalYield).toBeCloseTo(1047.9676024, 5);
    expect(summary.percentYield).toBeCloseTo(10.479676, 5);
  });

  it("rejects an empty series", () => {
    expect(() => summarizeProjection([], 1000)).toThrow(InvalidInputError);
  });
});

describe("summarizeSavings", () => {
  it("reports percent yield once a credit happened", () => {
    const summary = summarizeSavings(projectSavings(1000, 30), 1000);
    expect(summary.finalValue).toBeCloseTo(1005, 10);
    expect(summary.totalYield).toBeCloseTo(5, 10);
    expect(summary.percentYield).toBeCloseTo(0.5, 10);
  });

  it("marks percent yield as not applicable below 30 days", () => {
    expect(summarizeSavings(projectSavings(1000, 29), 1000)).toEqual({
      finalValue: 1000,
      totalYield: 0,
      percentYield: null,
    });
  });

  it("rejects a non-positive principal", () => {
    expect(() => summarizeSavings([0, 0], 0)).toThrow(InvalidInputError);
  });
});

describe("runSimulation", () => {
  it("skips the baseline when there is no bonus", () => {
    const result = runSimulation(getOneSavingsCycle());

    expect(result.series).toHaveLength(30);
    expect(result.savings).toHaveLength(30);
    expect(result.baseline).toBeNull();
    expect(result.summary.baseline).toBeNull();
    expect(result.savingsApplicable).toBe(true);
    expect(result.tier1Multiplier).toBeCloseTo(1.1, 12);
    expect(result.dailyRate).toBeCloseTo(0.00028966, 8);
  });

  it("runs an independent zero-bonus baseline when a bonus is set", () => {
    const input = getWithBonus();
    const result = runSimulation(input);

    expect(result.baseline).toEqual(
      project(input.principal, input.days, input.annualRatePercent, 0)
    );
    expect(result.summary.product.finalValue).toBeCloseTo(11_103.123792, 5);
    expect(result.summary.baseline?.finalValue).toBeCloseTo(11_047.9676024, 5);
    expect(result.summary.product.percentYield).toBeCloseTo(11.03123792, 6);
    expect(result.tier1Multiplier).toBeCloseTo(1.2, 12);
  });

  it("flags savings as not applicable for short horizons", () => {
    const result = runSimulation(getShortHorizon());
    expect(result.savingsApplicable).toBe(false);
    expect(result.summary.savings.percentYield).toBeNull();
    expect(result.summary.product.percentYield).toBeGreaterThan(0);
  });

  it("applies the default bonus", () => {
    const result = runSimulation({ principal: 500, days: 3, annualRatePercent: 11.15 });
    expect(result.input.bonusPercent).toBe(0);
  });

  it("throws on out-of-contract input", () => {
    expect(() =>
      runSimulation({ principal: 1000, days: 0, annualRatePercent: 11.15 })
    ).toThrow(InvalidInputError);
  });
});

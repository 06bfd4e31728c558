import { describe, it, expect } from "vitest";
import { buildComparisonChartData, paddedDomain, productLabel } from "./chart-series";
import { runSimulation } from "@/lib/model/summary";
import { getShortHorizon } from "@/fixtures/scenarios";

describe("productLabel", () => {
  it("shows the tier-1 percent of CDI", () => {
    expect(productLabel(0)).toBe("99Pay (110%)");
    expect(productLabel(10)).toBe("99Pay (120%)");
  });
});

describe("paddedDomain", () => {
  it("pads by 5% of the range", () => {
    const [min, max] = paddedDomain([100, 150, 200]);
    expect(min).toBeCloseTo(95, 10);
    expect(max).toBeCloseTo(205, 10);
  });

  it("pads a flat series by 1% of its value", () => {
    expect(paddedDomain([1000, 1000])).toEqual([990, 1010]);
  });
});

describe("buildComparisonChartData", () => {
  it("plots bonus, baseline and savings lines", () => {
    const result = runSimulation({
      principal: 1000,
      days: 30,
      annualRatePercent: 11.15,
      bonusPercent: 10,
    });
    const { rows, series } = buildComparisonChartData(result);

    expect(series).toEqual([
      { key: "product", label: "99Pay (120%)" },
      { key: "baseline", label: "99Pay (110%)" },
      { key: "savings", label: "Poupança" },
    ]);
    expect(rows).toHaveLength(30);
    expect(rows[0]?.day).toBe(1);
    expect(rows[0]?.product).toBe(result.series[0]?.endBalance);
    expect(rows[0]?.baseline).toBe(result.baseline?.[0]?.endBalance);
    expect(rows[0]?.savings).toBe(1000);
    expect(rows[29]?.savings).toBeCloseTo(1005, 10);
  });

  it("omits savings below 30 days and baseline without bonus", () => {
    const result = runSimulation(getShortHorizon());
    const { rows, series, domain } = buildComparisonChartData(result);

    expect(series).toEqual([{ key: "product", label: "99Pay (110%)" }]);
    expect(rows[0]).toEqual({ day: 1, product: result.series[0]?.endBalance });

    const first = result.series[0]?.endBalance ?? 0;
    const last = result.series[19]?.endBalance ?? 0;
    const padding = (last - first) * 0.05;
    expect(domain[0]).toBeCloseTo(first - padding, 10);
    expect(domain[1]).toBeCloseTo(last + padding, 10);
  });
});

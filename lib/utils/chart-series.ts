/**
 * Shape a simulation result into rows for the comparison line chart.
 */

import type { SimulationResult } from "@/lib/model/summary";
import { tier1Percent } from "@/lib/model/engine";

export type ChartSeriesKey = "product" | "baseline" | "savings";

export interface ChartSeries {
  key: ChartSeriesKey;
  label: string;
}

export interface ChartRow {
  day: number;
  product: number;
  baseline?: number;
  savings?: number;
}

export interface ComparisonChartData {
  rows: ChartRow[];
  series: ChartSeries[];
  domain: [number, number];
}

export function productLabel(bonusPercent: number): string {
  return `99Pay (${tier1Percent(bonusPercent).toFixed(0)}%)`;
}

/**
 * Y-axis domain padded by 5% of the range so lines don't touch the edges.
 * A flat series pads by 1% of its value instead.
 */
export function paddedDomain(values: number[]): [number, number] {
  if (values.length === 0) return [0, 0];
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  let padding = (max - min) * 0.05;
  if (padding === 0) padding = min * 0.01;
  return [min - padding, max + padding];
}

/**
 * Baseline line only when a bonus is set; savings line only when the horizon
 * reaches a credit (30+ days).
 */
export function buildComparisonChartData(result: SimulationResult): ComparisonChartData {
  const { series, baseline, savings, savingsApplicable, input } = result;

  const chartSeries: ChartSeries[] = [
    { key: "product", label: productLabel(input.bonusPercent) },
  ];
  if (baseline) chartSeries.push({ key: "baseline", label: productLabel(0) });
  if (savingsApplicable) chartSeries.push({ key: "savings", label: "Poupança" });

  const values: number[] = [];
  const rows = series.map((record, i): ChartRow => {
    const row: ChartRow = { day: record.day, product: record.endBalance };
    values.push(record.endBalance);

    const base = baseline?.[i];
    if (base) {
      row.baseline = base.endBalance;
      values.push(base.endBalance);
    }

    const saved = savingsApplicable ? savings[i] : undefined;
    if (saved !== undefined) {
      row.savings = saved;
      values.push(saved);
    }
    return row;
  });

  return { rows, series: chartSeries, domain: paddedDomain(values) };
}

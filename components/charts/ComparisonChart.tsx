"use client";

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from "recharts";
import type { SimulationResult } from "@/lib/model/summary";
import type { ChartSeriesKey } from "@/lib/utils/chart-series";
import { buildComparisonChartData } from "@/lib/utils/chart-series";
import { formatCompactCurrency, formatCurrency } from "@/lib/utils/format";

const SERIES_COLORS: Record<ChartSeriesKey, string> = {
  product: "var(--accent)",
  baseline: "var(--primary)",
  savings: "var(--content-muted)",
};

interface ComparisonChartProps {
  result: SimulationResult;
}

export function ComparisonChart({ result }: ComparisonChartProps) {
  const { rows, series, domain } = buildComparisonChartData(result);

  return (
    <div className="h-[450px] min-w-0 w-full">
      <h3 className="mb-2 text-center text-lg font-semibold text-content">
        Evolução Comparativa do Investimento
      </h3>
      <ResponsiveContainer width="100%" height="100%" minHeight={360}>
        <LineChart data={rows} margin={{ top: 8, right: 16, left: 16, bottom: 8 }}>
          <CartesianGrid strokeDasharray="3 3" className="stroke-border" />
          <XAxis
            dataKey="day"
            type="number"
            domain={["dataMin", "dataMax"]}
            tick={{ fontSize: 12 }}
            tickLine={false}
            label={{ value: "Dia do Investimento", position: "insideBottom", offset: -4, fontSize: 13 }}
          />
          <YAxis
            domain={domain}
            tickFormatter={(v: number) => formatCompactCurrency(v)}
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={false}
            width={80}
          />
          <Tooltip
            contentStyle={{
              backgroundColor: "var(--surface-elevated)",
              border: "1px solid var(--border)",
              borderRadius: "6px",
            }}
            labelFormatter={(day) => `Dia ${day}`}
            formatter={(value) => formatCurrency(Number(value))}
          />
          <Legend verticalAlign="top" align="left" wrapperStyle={{ fontSize: 12 }} />
          {series.map((s) => (
            <Line
              key={s.key}
              type="monotone"
              dataKey={s.key}
              name={s.label}
              stroke={SERIES_COLORS[s.key]}
              strokeWidth={2}
              dot={false}
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}

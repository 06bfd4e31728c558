"use client";

import type { SimulationResult } from "@/lib/model/summary";
import { buildLedgerHeaders } from "@/lib/export/ledgerToCsv";
import { formatCurrency } from "@/lib/utils/format";

const cellBase =
  "px-4 py-2 text-right text-sm tabular-nums text-content border-b border-border";
const headerBase =
  "px-4 py-3 text-right text-xs font-medium uppercase tracking-wider text-content-muted border-b border-border bg-surface-elevated sticky top-0";

export function DailyLedgerTable({ result }: { result: SimulationResult }) {
  const headers = buildLedgerHeaders(result.input.bonusPercent);

  return (
    <div className="max-h-[32rem] overflow-auto rounded-lg border border-border">
      <table className="w-full border-collapse">
        <thead>
          <tr>
            {headers.map((h) => (
              <th key={h} className={headerBase}>
                {h}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {result.series.map((r) => (
            <tr key={r.day}>
              <td className={cellBase}>{r.day}</td>
              <td className={cellBase}>{formatCurrency(r.startBalance)}</td>
              <td className={cellBase}>{formatCurrency(r.tier1Yield)}</td>
              <td className={cellBase}>{formatCurrency(r.tier2Yield)}</td>
              <td className={cellBase}>{formatCurrency(r.totalYield)}</td>
              <td className={cellBase}>{formatCurrency(r.endBalance)}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

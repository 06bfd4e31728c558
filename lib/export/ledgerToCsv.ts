/**
 * Export the daily ledger to CSV for download.
 * Columns mirror the ledger table; amounts are raw numbers with two decimals.
 */

import type { SimulationResult, SeriesSummary } from "@/lib/model/summary";
import type { DailyRecord } from "@/lib/types/zod";
import { tier1Percent } from "@/lib/model/engine";

/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
function escapeCsvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCsvAmount(n: number): string {
  return n.toFixed(2);
}

export function buildLedgerHeaders(bonusPercent: number): string[] {
  return [
    "Dia",
    "Valor Inicial",
    `Rendimento Faixa 1 (${tier1Percent(bonusPercent).toFixed(0)}%)`,
    "Rendimento Faixa 2 (80%)",
    "Rendimento Total Dia",
    "Valor Final",
  ];
}

function recordToCells(record: DailyRecord): string[] {
  return [
    String(record.day),
    formatCsvAmount(record.startBalance),
    formatCsvAmount(record.tier1Yield),
    formatCsvAmount(record.tier2Yield),
    formatCsvAmount(record.totalYield),
    formatCsvAmount(record.endBalance),
  ];
}

function summaryLines(label: string, summary: SeriesSummary): string[] {
  return [
    `${escapeCsvField(label)} - Valor Final,${formatCsvAmount(summary.finalValue)}`,
    `${escapeCsvField(label)} - Rendimento,${formatCsvAmount(summary.totalYield)}`,
    `${escapeCsvField(label)} - Rendimento (%),${
      summary.percentYield === null ? "N/A" : summary.percentYield.toFixed(2)
    }`,
  ];
}

/** Ledger rows, then a summary block separated by "--- Resumo ---". */
export function ledgerToCsv(result: SimulationResult): string {
  const { input, series, summary } = result;
  const lines: string[] = [
    buildLedgerHeaders(input.bonusPercent).map(escapeCsvField).join(","),
  ];

  for (const record of series) {
    lines.push(recordToCells(record).join(","));
  }

  lines.push("--- Resumo ---");
  lines.push(`Valor Investido,${formatCsvAmount(input.principal)}`);
  lines.push(`CDI Anual (%),${input.annualRatePercent}`);
  lines.push(...summaryLines("99Pay", summary.product));
  if (summary.baseline) {
    lines.push(...summaryLines("99Pay sem bônus", summary.baseline));
  }
  lines.push(...summaryLines("Poupança", summary.savings));

  return lines.join("\n") + "\n";
}

/** Trigger browser download of the ledger as a CSV file. */
export function downloadLedgerCsv(result: SimulationResult, filename?: string): void {
  const csv = ledgerToCsv(result);
  const blob = new Blob([csv], { type: "text/csv;charset=utf-8;" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download =
    filename ??
    `simulacao-99pay-${result.input.days}-dias-${new Date().toISOString().slice(0, 10)}.csv`;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
  URL.revokeObjectURL(url);
}

"use client";

import { HelpTooltip } from "@/components/ui/help-tooltip";
import { formatHelpContent, HELP_METRICS, type HelpEntry } from "@/lib/copy/help";
import type { SimulationResult } from "@/lib/model/summary";
import { formatCurrency, formatPercent, formatPeriod } from "@/lib/utils/format";

interface Metric {
  label: string;
  value: string;
  subtext?: string;
  help?: HelpEntry;
}

function buildMetrics(result: SimulationResult): Metric[] {
  const { input, summary, savingsApplicable } = result;
  const { product, savings } = summary;

  return [
    { label: "Valor Investido", value: formatCurrency(input.principal) },
    { label: "Tempo do Investimento", value: formatPeriod(input.days) },
    { label: "Valor Final", value: formatCurrency(product.finalValue) },
    {
      label: "Rendimento Total (99Pay)",
      value: formatCurrency(product.totalYield),
      subtext: product.percentYield === null ? undefined : formatPercent(product.percentYield),
      help: HELP_METRICS.product,
    },
    savingsApplicable && savings.percentYield !== null
      ? {
          label: "Rendimento Poupança (est.)",
          value: formatCurrency(savings.totalYield),
          subtext: formatPercent(savings.percentYield),
          help: HELP_METRICS.savings,
        }
      : {
          label: "Rendimento Poupança (est.)",
          value: "N/A",
          help: HELP_METRICS.savingsNotApplicable,
        },
  ];
}

export function SummaryCards({ result }: { result: SimulationResult }) {
  const metrics = buildMetrics(result);

  return (
    <section>
      <h2 className="mb-3 text-xl font-semibold text-content">Resumo da Simulação</h2>
      <div className="grid grid-cols-2 gap-3 lg:grid-cols-5">
        {metrics.map((m) => (
          <div
            key={m.label}
            className="rounded-lg border border-border bg-surface-elevated p-4"
          >
            <div className="flex items-center gap-1.5 text-xs font-medium uppercase tracking-wider text-content-muted">
              {m.label}
              {m.help && <HelpTooltip content={formatHelpContent(m.help)} />}
            </div>
            <div className="mt-1 text-lg font-semibold tabular-nums text-content">{m.value}</div>
            {m.subtext && (
              <div className="text-sm tabular-nums text-emerald-700">{m.subtext}</div>
            )}
          </div>
        ))}
      </div>
    </section>
  );
}

/**
 * Help content for the sidebar fields and summary cards.
 * Format: { title, description, example? }
 */

export type HelpEntry = {
  title: string;
  description: string;
  example?: string;
};

/** Format HelpEntry for tooltip content (description + optional example). */
export function formatHelpContent(entry: HelpEntry): string {
  return entry.example
    ? `${entry.description} Ex: ${entry.example}`
    : entry.description;
}

export const HELP_FORM = {
  principal: {
    title: "Valor Investido",
    description: "Montante inicial que você deseja investir.",
    example: "5000,00",
  },
  bonusPercent: {
    title: "Bônus Adicional",
    description:
      "Opcional. Bônus a ser somado à taxa da primeira faixa (110% do CDI).",
    example: "10 para 120%",
  },
  days: {
    title: "Período",
    description: "Por quantos dias o dinheiro ficará investido.",
    example: "365",
  },
  annualRatePercent: {
    title: "Taxa CDI Anual",
    description:
      "A taxa DI (CDI) vigente no período. O valor padrão é uma referência.",
  },
} satisfies Record<string, HelpEntry>;

export const HELP_METRICS = {
  product: {
    title: "Rendimento Total (99Pay)",
    description:
      "110% do CDI (mais o bônus) até R$ 5.000 e 80% do CDI sobre o que passar disso, capitalizado diariamente.",
  },
  savings: {
    title: "Rendimento Poupança (est.)",
    description:
      "Estimativa com rendimento de 0.5% a.m. e sem considerar a Taxa Referencial (TR).",
  },
  savingsNotApplicable: {
    title: "Rendimento Poupança (est.)",
    description: "A poupança requer no mínimo 30 dias para render.",
  },
} satisfies Record<string, HelpEntry>;

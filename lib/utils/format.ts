/**
 * Display formatting (pt-BR). The model never produces strings; only the UI calls these.
 */

const AMOUNT_FORMAT = new Intl.NumberFormat("pt-BR", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** R$ 1.234,56 (plain space after the symbol). */
export function formatCurrency(amount: number): string {
  const sign = amount < 0 ? "-" : "";
  return `${sign}R$ ${AMOUNT_FORMAT.format(Math.abs(amount))}`;
}

/** Percent already scaled to 0–100, two decimals: 3.45% */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/** Axis ticks: R$ 12k, R$ 1.2M */
export function formatCompactCurrency(value: number): string {
  if (Math.abs(value) >= 1_000_000) {
    return `R$ ${(value / 1_000_000).toFixed(1)}M`;
  }
  if (Math.abs(value) >= 1_000) {
    return `R$ ${(value / 1_000).toFixed(0)}k`;
  }
  return `R$ ${Math.round(value)}`;
}

/** Friendly period label: exact years, then 30-day months, then weeks, else days. */
export function formatPeriod(days: number): string {
  if (days <= 0) return `${days} dias`;
  if (days === 1) return "1 dia";

  if (days % 365 === 0) {
    const years = days / 365;
    return `${years} ano${years > 1 ? "s" : ""}`;
  }

  // 31 days reads as a calendar month
  if (days === 31) return "1 mês";
  if (days % 30 === 0) {
    const months = days / 30;
    return `${months} ${months > 1 ? "meses" : "mês"}`;
  }

  if (days % 7 === 0) {
    const weeks = days / 7;
    return `${weeks} semana${weeks > 1 ? "s" : ""}`;
  }

  return `${days} dias`;
}

/** 1.500 / 1.234.567: dots as thousands separators, no decimals. */
const GROUPED_INTEGER = /^-?\d{1,3}(\.\d{3})+$/;
/** 12,5 / 5.000,00: comma decimals, optional dot grouping. */
const COMMA_DECIMAL = /^-?(\d{1,3}(\.\d{3})+|\d+),\d+$/;

/**
 * Raw input value → number in pt-BR notation.
 * null when empty; NaN when the text is not a number, so validation reports it as invalid.
 * Without a comma, dots in groups of three are thousands ("1.500" → 1500); otherwise a dot is
 * a decimal point ("11.15").
 */
export function parseNumberInput(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === "") return null;

  if (trimmed.includes(",")) {
    if (!COMMA_DECIMAL.test(trimmed)) return Number.NaN;
    return Number(trimmed.replace(/\./g, "").replace(",", "."));
  }
  if (GROUPED_INTEGER.test(trimmed)) {
    return Number(trimmed.replace(/\./g, ""));
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : Number.NaN;
}

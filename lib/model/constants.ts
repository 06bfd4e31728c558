/**
 * Product constants for the 99Pay yield model.
 * Rates are decimals unless the name says percent.
 */

/** Days per year used to back out the daily rate from the annual CDI. */
export const DAYS_PER_YEAR = 365;

/** Balance ceiling (R$) of the first yield bracket. */
export const TIER1_LIMIT = 5000;

/** Tier-1 multiplier over the daily CDI before any bonus (110% of CDI). */
export const TIER1_BASE_MULTIPLIER = 1.1;

/** Tier-2 multiplier over the daily CDI (80% of CDI). Bonus never applies here. */
export const TIER2_MULTIPLIER = 0.8;

/** Simplified savings account (poupança): 0.5% a month, no TR component. */
export const SAVINGS_MONTHLY_RATE = 0.005;

/** Days between savings credits ("aniversário"). */
export const SAVINGS_CYCLE_DAYS = 30;

/** Annual CDI (%) pre-filled in the form when no override is configured. */
export const DEFAULT_ANNUAL_RATE_PERCENT = 11.15;

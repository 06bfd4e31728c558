/**
 * Sidebar form state as plain values.
 * Every operation returns a new form; the store only keeps the latest one.
 */

import type { SimulationForm, SimulationInput } from "@/lib/types/zod";
import { validateSimulationForm, type ValidationResult } from "./validation";

export type FormSubmission =
  | { ok: true; input: SimulationInput; validation: ValidationResult }
  | { ok: false; validation: ValidationResult };

/** Amount and days start empty; the CDI starts at the configured default. */
export function createDefaultForm(defaultRatePercent: number): SimulationForm {
  return {
    principal: null,
    days: null,
    annualRatePercent: defaultRatePercent,
    bonusPercent: 0,
  };
}

export function updateForm(
  form: SimulationForm,
  patch: Partial<SimulationForm>
): SimulationForm {
  return { ...form, ...patch };
}

/** "Redefinir CDI": only the rate changes. */
export function resetRate(
  form: SimulationForm,
  defaultRatePercent: number
): SimulationForm {
  return { ...form, annualRatePercent: defaultRatePercent };
}

/** "Limpar Simulação": empties amount and days, zeroes the bonus, keeps the CDI. */
export function clearForm(form: SimulationForm): SimulationForm {
  return {
    principal: null,
    days: null,
    annualRatePercent: form.annualRatePercent,
    bonusPercent: 0,
  };
}

export function submitForm(form: SimulationForm): FormSubmission {
  const validation = validateSimulationForm(form);
  const { principal, days, annualRatePercent, bonusPercent } = form;
  if (
    validation.errors.length > 0 ||
    principal === null ||
    days === null ||
    annualRatePercent === null
  ) {
    return { ok: false, validation };
  }
  return {
    ok: true,
    input: { principal, days, annualRatePercent, bonusPercent },
    validation,
  };
}

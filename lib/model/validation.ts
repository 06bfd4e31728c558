/**
 * Form validation for the simulation sidebar.
 * Hard errors block calculation; soft warnings allow it.
 */

import type { SimulationForm } from "@/lib/types/zod";
import { SAVINGS_CYCLE_DAYS } from "@/lib/model/constants";

/** Codes shared by form validation and the core's InvalidInputError. */
export const VALIDATION_CODES = {
  MISSING_FIELDS: "MISSING_FIELDS",
  INVALID_PRINCIPAL: "INVALID_PRINCIPAL",
  INVALID_DAYS: "INVALID_DAYS",
  INVALID_RATE: "INVALID_RATE",
  INVALID_BONUS: "INVALID_BONUS",
  INVALID_INPUT: "INVALID_INPUT",
  EMPTY_SERIES: "EMPTY_SERIES",
  SAVINGS_NOT_APPLICABLE: "SAVINGS_NOT_APPLICABLE",
} as const;
export type ValidationCode = (typeof VALIDATION_CODES)[keyof typeof VALIDATION_CODES];

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function validateSimulationForm(form: SimulationForm): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { principal, days, annualRatePercent, bonusPercent } = form;

  if (principal === null || days === null) {
    errors.push({
      code: VALIDATION_CODES.MISSING_FIELDS,
      message:
        "Por favor, preencha os campos 'Valor Investido' e 'Período' para continuar.",
    });
  }

  if (principal !== null && !isPositive(principal)) {
    errors.push({
      code: VALIDATION_CODES.INVALID_PRINCIPAL,
      message: "O valor investido deve ser um número maior que zero.",
    });
  }

  const daysValid = days !== null && Number.isInteger(days) && days >= 1;
  if (days !== null && !daysValid) {
    errors.push({
      code: VALIDATION_CODES.INVALID_DAYS,
      message: "O período deve ser um número inteiro de dias (mínimo 1).",
    });
  }

  if (annualRatePercent === null || !isPositive(annualRatePercent)) {
    errors.push({
      code: VALIDATION_CODES.INVALID_RATE,
      message: "A taxa CDI anual deve ser maior que zero.",
    });
  }

  if (!Number.isFinite(bonusPercent) || bonusPercent < 0) {
    errors.push({
      code: VALIDATION_CODES.INVALID_BONUS,
      message: "O bônus adicional não pode ser negativo.",
    });
  }

  if (daysValid && days < SAVINGS_CYCLE_DAYS) {
    warnings.push({
      code: VALIDATION_CODES.SAVINGS_NOT_APPLICABLE,
      message: "A poupança requer no mínimo 30 dias para render.",
    });
  }

  return { errors, warnings };
}

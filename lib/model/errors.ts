import type { ZodIssue } from "zod";
import { VALIDATION_CODES, type ValidationError } from "./validation";

/** Error code per SimulationInput field. */
const FIELD_CODES: Record<string, string> = {
  principal: VALIDATION_CODES.INVALID_PRINCIPAL,
  days: VALIDATION_CODES.INVALID_DAYS,
  annualRatePercent: VALIDATION_CODES.INVALID_RATE,
  bonusPercent: VALIDATION_CODES.INVALID_BONUS,
};

/**
 * Thrown by the projection core when called out of contract
 * (non-positive principal or rate, days < 1, negative bonus).
 */
export class InvalidInputError extends Error {
  readonly code = VALIDATION_CODES.INVALID_INPUT;
  readonly issues: ValidationError[];

  constructor(issues: ValidationError[]) {
    super(
      issues.length > 0
        ? `Invalid simulation input: ${issues.map((i) => i.message).join("; ")}`
        : "Invalid simulation input"
    );
    this.name = "InvalidInputError";
    this.issues = issues;
  }

  static fromZodIssues(issues: ZodIssue[]): InvalidInputError {
    return new InvalidInputError(
      issues.map((issue) => {
        const field = String(issue.path[0] ?? "");
        return {
          code: FIELD_CODES[field] ?? VALIDATION_CODES.INVALID_INPUT,
          message: field ? `${field}: ${issue.message}` : issue.message,
        };
      })
    );
  }
}

export function isInvalidInputError(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError;
}

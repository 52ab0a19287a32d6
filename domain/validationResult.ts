/**
 * Aggregate outcome of one validation pass. isValid === (errors.length === 0).
 */

import type { PasswordError } from "./passwordError.js";
import { invariant } from "./validation.js";

export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly PasswordError[];
}

const SUCCESS: ValidationResult = Object.freeze({
  isValid: true,
  errors: Object.freeze([]),
});

function success(): ValidationResult {
  return SUCCESS;
}

/** Errors in rule evaluation order. Must be non-empty. */
function failure(errors: readonly PasswordError[]): ValidationResult {
  invariant(errors.length > 0, "failure() requires at least one error");
  return Object.freeze({ isValid: false, errors: Object.freeze([...errors]) });
}

export const ValidationResult = Object.freeze({ success, failure });

/** Descriptions of the result's errors, in order. Empty for success or null. */
export function errorDescriptions(result: ValidationResult | null): string[] {
  if (result === null) return [];
  return result.errors.map((e) => e.description);
}

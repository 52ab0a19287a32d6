/**
 * Password field state — live validation for an input field. No UI logic.
 * Pure transitions over immutable state; the host owns the current value.
 */

import type { PasswordValidator } from "./passwordValidator.js";
import type { ValidationResult } from "./validationResult.js";

export interface PasswordFieldState {
  readonly password: string;
  /** null until the first update, or after clearValidation. */
  readonly result: ValidationResult | null;
}

export function createPasswordField(): PasswordFieldState {
  return { password: "", result: null };
}

/** Store the new password and its validation result. */
export function updatePassword(
  state: PasswordFieldState,
  password: string,
  validator: PasswordValidator
): PasswordFieldState {
  return { ...state, password, result: validator.validate(password) };
}

/** Drop the result, keep the password. */
export function clearValidation(state: PasswordFieldState): PasswordFieldState {
  return { ...state, result: null };
}

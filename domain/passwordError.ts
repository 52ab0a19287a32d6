/**
 * Password error model — closed set of built-in failure kinds plus Custom.
 * Values are frozen; built-in kinds are singletons.
 */

import { neverReached } from "./validation.js";

export type BuiltInPasswordErrorKind =
  | "TooShort"
  | "MissingUppercase"
  | "MissingDigit"
  | "MissingSpecialChar";

export type PasswordErrorKind = BuiltInPasswordErrorKind | "Custom";

interface BuiltInPasswordError<K extends BuiltInPasswordErrorKind> {
  readonly kind: K;
  readonly description: string;
}

export type TooShortError = BuiltInPasswordError<"TooShort">;
export type MissingUppercaseError = BuiltInPasswordError<"MissingUppercase">;
export type MissingDigitError = BuiltInPasswordError<"MissingDigit">;
export type MissingSpecialCharError = BuiltInPasswordError<"MissingSpecialChar">;

/** Failure produced by a caller-defined rule. description === message. */
export interface CustomPasswordError {
  readonly kind: "Custom";
  readonly message: string;
  readonly description: string;
}

export type PasswordError =
  | TooShortError
  | MissingUppercaseError
  | MissingDigitError
  | MissingSpecialCharError
  | CustomPasswordError;

// Fixed text; does not reflect a configured minimum length.
const DESCRIPTIONS: Readonly<Record<BuiltInPasswordErrorKind, string>> = {
  TooShort: "Password must be at least 8 characters long",
  MissingUppercase: "Password must include an uppercase letter",
  MissingDigit: "Password must include a number",
  MissingSpecialChar: "Password must include a special character",
};

function builtIn<K extends BuiltInPasswordErrorKind>(kind: K): BuiltInPasswordError<K> {
  return Object.freeze({ kind, description: DESCRIPTIONS[kind] });
}

function custom(message: string): CustomPasswordError {
  return Object.freeze<CustomPasswordError>({ kind: "Custom", message, description: message });
}

export const PasswordError = Object.freeze({
  TooShort: builtIn("TooShort"),
  MissingUppercase: builtIn("MissingUppercase"),
  MissingDigit: builtIn("MissingDigit"),
  MissingSpecialChar: builtIn("MissingSpecialChar"),
  custom,
});

/** Human-readable text for an error. Custom errors return their message. */
export function describePasswordError(error: PasswordError): string {
  switch (error.kind) {
    case "TooShort":
    case "MissingUppercase":
    case "MissingDigit":
    case "MissingSpecialChar":
      return DESCRIPTIONS[error.kind];
    case "Custom":
      return error.message;
    default:
      return neverReached(error, "Unknown password error kind");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** True for a well-formed PasswordError value (built-in or custom). */
export function isPasswordError(value: unknown): value is PasswordError {
  if (!isRecord(value)) return false;
  const { kind, description } = value;
  if (typeof description !== "string") return false;
  if (kind === "Custom") {
    return typeof value.message === "string" && value.message === description;
  }
  return (
    (kind === "TooShort" ||
      kind === "MissingUppercase" ||
      kind === "MissingDigit" ||
      kind === "MissingSpecialChar") &&
    DESCRIPTIONS[kind] === description
  );
}

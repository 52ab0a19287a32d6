/**
 * Declarative password policy — for hosts that keep requirements in config.
 * Rule order is fixed: length, uppercase, digit, special, then extra rules.
 */

import { PasswordValidator } from "./passwordValidator.js";
import { DEFAULT_MIN_LENGTH, type PasswordRule } from "./rules.js";
import { assertConfig } from "./validation.js";

export interface PasswordPolicy {
  /** Omitted → no length rule. */
  readonly minLength?: number;
  readonly requireUppercase?: boolean;
  readonly requireDigit?: boolean;
  /** true → default set; string → custom set. */
  readonly requireSpecialCharacter?: boolean | string;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = Object.freeze({
  minLength: DEFAULT_MIN_LENGTH,
  requireUppercase: true,
  requireDigit: true,
  requireSpecialCharacter: true,
});

const POLICY_KEYS: readonly string[] = [
  "minLength",
  "requireUppercase",
  "requireDigit",
  "requireSpecialCharacter",
];

export function validatorFromPolicy(
  policy: PasswordPolicy,
  extraRules: readonly PasswordRule[] = []
): PasswordValidator {
  const b = PasswordValidator.builder();
  if (policy.minLength !== undefined) b.minLength(policy.minLength);
  if (policy.requireUppercase === true) b.requireUppercase();
  if (policy.requireDigit === true) b.requireDigit();
  const special = policy.requireSpecialCharacter;
  if (special === true) b.requireSpecialCharacter();
  else if (typeof special === "string") b.requireSpecialCharacter(special);
  for (const rule of extraRules) b.addRule(rule);
  return b.build();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalBoolean(input: Record<string, unknown>, key: string): boolean | undefined {
  const v = input[key];
  assertConfig(v === undefined || typeof v === "boolean", `${key} must be a boolean`, { key, value: v });
  return v;
}

/** Validate an untyped value (e.g. parsed JSON). Throws ValidationError. */
export function parsePasswordPolicy(input: unknown): PasswordPolicy {
  assertConfig(isRecord(input), "Password policy must be an object");
  for (const key of Object.keys(input)) {
    assertConfig(POLICY_KEYS.includes(key), `Unknown password policy key: ${key}`, { key });
  }

  const minLength = input.minLength;
  assertConfig(
    minLength === undefined || (typeof minLength === "number" && Number.isInteger(minLength)),
    "minLength must be an integer",
    { key: "minLength", value: minLength }
  );

  const special = input.requireSpecialCharacter;
  assertConfig(
    special === undefined || typeof special === "boolean" || typeof special === "string",
    "requireSpecialCharacter must be a boolean or a string",
    { key: "requireSpecialCharacter", value: special }
  );

  return {
    minLength,
    requireUppercase: optionalBoolean(input, "requireUppercase"),
    requireDigit: optionalBoolean(input, "requireDigit"),
    requireSpecialCharacter: special,
  };
}

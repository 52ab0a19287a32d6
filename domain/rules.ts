/**
 * Password rules — single-capability predicates with a fixed failure kind.
 * Rules hold construction-time configuration only; validate() is pure.
 *
 * Characters are code points, so astral symbols (emoji, rare scripts) count
 * once and are matched as a whole.
 */

import { PasswordError } from "./passwordError.js";
import { assertConfig } from "./validation.js";

export type RuleResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: PasswordError };

/** Extension point. Implement and register via the builder's addRule(). */
export interface PasswordRule {
  validate(password: string): RuleResult;
}

const OK: RuleResult = Object.freeze<RuleResult>({ ok: true });

export function ruleOk(): RuleResult {
  return OK;
}

export function ruleFailure(error: PasswordError): RuleResult {
  return Object.freeze<RuleResult>({ ok: false, error });
}

export const DEFAULT_MIN_LENGTH = 8;

export const DEFAULT_SPECIAL_CHARACTERS = "!@#$%^&*(),.?\":{}|<>-_+=[]\\;'`~";

/** Number of code points in s. */
export function codePointLength(s: string): number {
  return [...s].length;
}

/** Passes when the password has at least minLength code points. */
export class MinLengthRule implements PasswordRule {
  readonly minLength: number;

  constructor(minLength: number = DEFAULT_MIN_LENGTH) {
    assertConfig(Number.isInteger(minLength), "minLength must be an integer", { minLength });
    this.minLength = minLength;
  }

  validate(password: string): RuleResult {
    return codePointLength(password) >= this.minLength
      ? ruleOk()
      : ruleFailure(PasswordError.TooShort);
  }
}

// Uppercase = Lu plus Other_Uppercase (e.g. Ⓐ).
const UPPERCASE = /\p{Uppercase}/u;

/** Passes when any character is an uppercase letter (Unicode-aware). */
export class UppercaseRule implements PasswordRule {
  validate(password: string): RuleResult {
    return UPPERCASE.test(password) ? ruleOk() : ruleFailure(PasswordError.MissingUppercase);
  }
}

// Decimal digits in any script (Nd), e.g. "٣".
const DIGIT = /\p{Nd}/u;

/** Passes when any character is a decimal digit. */
export class DigitRule implements PasswordRule {
  validate(password: string): RuleResult {
    return DIGIT.test(password) ? ruleOk() : ruleFailure(PasswordError.MissingDigit);
  }
}

/** Passes when any character is in the configured set. Exact match, no case folding. */
export class SpecialCharacterRule implements PasswordRule {
  readonly specialChars: string;
  private readonly members: ReadonlySet<string>;

  constructor(specialChars: string = DEFAULT_SPECIAL_CHARACTERS) {
    this.specialChars = specialChars;
    this.members = new Set(specialChars);
  }

  validate(password: string): RuleResult {
    for (const ch of password) {
      if (this.members.has(ch)) return ruleOk();
    }
    return ruleFailure(PasswordError.MissingSpecialChar);
  }
}

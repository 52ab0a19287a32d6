/**
 * Validator and builder. The validator runs every rule (no fail-fast) and
 * aggregates failures in rule order. Immutable once built.
 */

import { isPasswordError, type PasswordError } from "./passwordError.js";
import {
  DEFAULT_MIN_LENGTH,
  DigitRule,
  MinLengthRule,
  SpecialCharacterRule,
  UppercaseRule,
  type PasswordRule,
  type RuleResult,
} from "./rules.js";
import { ValidationResult } from "./validationResult.js";
import { InvariantViolation } from "./errors.js";

function ruleName(rule: PasswordRule): string {
  // Rules built on Object.create(null) have no constructor.
  return rule.constructor?.name || "anonymous";
}

/** Rejects anything a JS caller or a loosely typed rule might return. */
function errorOf(result: RuleResult, rule: PasswordRule, index: number): PasswordError | null {
  if (typeof result !== "object" || result === null || typeof result.ok !== "boolean") {
    throw new InvariantViolation("Rule returned a malformed result", { rule: ruleName(rule), index });
  }
  if (result.ok) return null;
  if (!isPasswordError(result.error)) {
    throw new InvariantViolation("Rule failed with an unrecognized error", {
      rule: ruleName(rule),
      index,
      error: result.error,
    });
  }
  return result.error;
}

export class PasswordValidator {
  /** Frozen snapshot, in evaluation order. */
  readonly rules: readonly PasswordRule[];

  constructor(rules: readonly PasswordRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  validate(password: string): ValidationResult {
    const errors: PasswordError[] = [];
    this.rules.forEach((rule, index) => {
      const error = errorOf(rule.validate(password), rule, index);
      if (error !== null) errors.push(error);
    });
    return errors.length > 0 ? ValidationResult.failure(errors) : ValidationResult.success();
  }

  static builder(): PasswordValidatorBuilder {
    return new PasswordValidatorBuilder();
  }

  /** minLength(8), uppercase, digit, default special characters. */
  static defaultRules(): PasswordValidator {
    return PasswordValidator.builder()
      .minLength(DEFAULT_MIN_LENGTH)
      .requireUppercase()
      .requireDigit()
      .requireSpecialCharacter()
      .build();
  }
}

/** Append-only rule accumulator. Not safe for concurrent configuration. */
export class PasswordValidatorBuilder {
  private readonly rules: PasswordRule[] = [];

  minLength(length: number): this {
    return this.addRule(new MinLengthRule(length));
  }

  requireUppercase(): this {
    return this.addRule(new UppercaseRule());
  }

  requireDigit(): this {
    return this.addRule(new DigitRule());
  }

  requireSpecialCharacter(specialChars?: string): this {
    return this.addRule(
      specialChars === undefined ? new SpecialCharacterRule() : new SpecialCharacterRule(specialChars)
    );
  }

  addRule(rule: PasswordRule): this {
    this.rules.push(rule);
    return this;
  }

  /** Snapshot of the current rules; later builder calls do not affect it. */
  build(): PasswordValidator {
    return new PasswordValidator(this.rules);
  }
}

export function builder(): PasswordValidatorBuilder {
  return PasswordValidator.builder();
}

export function defaultRules(): PasswordValidator {
  return PasswordValidator.defaultRules();
}

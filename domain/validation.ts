/**
 * Guards — narrow or throw. TypeScript narrows after a successful call.
 */

import {
  InvariantViolation,
  ValidationError,
  type ConfigErrorMetadata,
  type RuleDefectMetadata,
} from "./errors.js";

/** Invariant that must always hold. Throws InvariantViolation. */
export function invariant(
  condition: unknown,
  message: string,
  metadata?: RuleDefectMetadata
): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}

/** Configuration check. Throws ValidationError. */
export function assertConfig(
  condition: unknown,
  message: string,
  metadata?: ConfigErrorMetadata
): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}

/** Exhaustive switch guard. Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new InvariantViolation(message, { value });
}

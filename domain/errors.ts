/**
 * Domain error model — thrown errors only.
 * Password failures are never thrown; they are returned in ValidationResult.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Names the configuration entry that was rejected. */
export interface ConfigErrorMetadata extends ErrorMetadata {
  readonly key?: string;
  readonly value?: unknown;
}

/** Names the rule that broke its contract and its position in the validator. */
export interface RuleDefectMetadata extends ErrorMetadata {
  readonly rule?: string;
  readonly index?: number;
}

/** Base for all thrown errors. Preserves prototype chain for instanceof. */
export class DomainError<M extends ErrorMetadata = ErrorMetadata> extends Error {
  readonly metadata: M | undefined;

  constructor(message: string, metadata?: M) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when rule or policy configuration is invalid. */
export class ValidationError extends DomainError<ConfigErrorMetadata> {
  /** Offending policy key, when the input was a policy object. */
  get key(): string | undefined {
    return this.metadata?.key;
  }
}

/** Thrown on a defect: a rule or caller broke a contract. */
export class InvariantViolation extends DomainError<RuleDefectMetadata> {
  /** Class name of the defective rule, when one is known. */
  get rule(): string | undefined {
    return this.metadata?.rule;
  }
}

/**
 * Public API.
 */

export {
  DomainError,
  InvariantViolation,
  ValidationError,
  type ConfigErrorMetadata,
  type ErrorMetadata,
  type RuleDefectMetadata,
} from "./errors.js";
export {
  PasswordError,
  describePasswordError,
  isPasswordError,
  type BuiltInPasswordErrorKind,
  type CustomPasswordError,
  type PasswordErrorKind,
} from "./passwordError.js";
export { ValidationResult, errorDescriptions } from "./validationResult.js";
export {
  DEFAULT_MIN_LENGTH,
  DEFAULT_SPECIAL_CHARACTERS,
  DigitRule,
  MinLengthRule,
  SpecialCharacterRule,
  UppercaseRule,
  codePointLength,
  ruleFailure,
  ruleOk,
  type PasswordRule,
  type RuleResult,
} from "./rules.js";
export {
  PasswordValidator,
  PasswordValidatorBuilder,
  builder,
  defaultRules,
} from "./passwordValidator.js";
export {
  DEFAULT_PASSWORD_POLICY,
  parsePasswordPolicy,
  validatorFromPolicy,
  type PasswordPolicy,
} from "./policy.js";
export {
  clearValidation,
  createPasswordField,
  updatePassword,
  type PasswordFieldState,
} from "./passwordField.js";

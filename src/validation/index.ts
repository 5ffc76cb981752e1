/**
 * Validation engine: issue taxonomy, identifier rules and the validator.
 */

export { checkApparatusGating, findDeprecatedFields } from "./apparatus.js";
export { normalizeDoi } from "./doi.js";
export {
  DocumentValidationError,
  formatIssue,
  formatWarning,
  joinPath,
  ROOT_PATH,
  type IssueKind,
  type LookupWarning,
  type ValidationIssue,
  type WarningCode,
} from "./issues.js";
export { compareName } from "./names.js";
export { isOrcidFormat, isValidOrcidChecksum, ORCID_PATTERN, orcidCheckDigit } from "./orcid.js";
export { RegistryChecker, type RegistryCheckResult } from "./registry-checks.js";
export {
  decodeDocument,
  DocumentValidator,
  toValidationIssue,
  type DocumentValidatorOptions,
  type ValidationResult,
} from "./validator.js";

/**
 * Validation issue and warning taxonomy.
 *
 * Errors are either STRUCTURAL (malformed document: wrong type, missing or
 * unknown key, mutually exclusive fields) or SEMANTIC (well-formed but wrong:
 * dimension mismatch, bad enumeration value, checksum or registry mismatch).
 * Both are fatal and are collected together, in document order.
 *
 * Warnings never affect the outcome of validation.
 */

export type IssueKind = "structural" | "semantic";

/**
 * Individual validation error.
 */
export interface ValidationIssue {
  /** Dotted path into the document, "(root)" for the document itself */
  path: string;
  /** Human-readable error message */
  message: string;
  kind: IssueKind;
  /** Rule identifier for programmatic handling */
  rule: string;
}

export type WarningCode =
  | "registry_unavailable"
  | "orcid_suggestion"
  | "orcid_name_unavailable"
  | "unused_common_property"
  | "deprecated_field"
  | "asymmetric_uncertainty"
  | "conversion_assumption"
  | "reference_fallback";

/**
 * Advisory information produced alongside validation or conversion.
 */
export interface LookupWarning {
  code: WarningCode;
  path: string;
  message: string;
}

export const ROOT_PATH = "(root)";

/**
 * Join path segments the way issues report them: `datapoints.0.temperature`.
 */
export function joinPath(segments: ReadonlyArray<string | number>): string {
  return segments.length === 0 ? ROOT_PATH : segments.join(".");
}

export function formatIssue(issue: ValidationIssue): string {
  return `[${issue.kind}] ${issue.path}: ${issue.message}`;
}

export function formatWarning(warning: LookupWarning): string {
  return `[${warning.code}] ${warning.path}: ${warning.message}`;
}

/**
 * Raised when a document fails validation. Carries every issue found.
 */
export class DocumentValidationError extends Error {
  public readonly issues: readonly ValidationIssue[];
  public readonly warnings: readonly LookupWarning[];

  constructor(
    message: string,
    issues: readonly ValidationIssue[],
    warnings: readonly LookupWarning[] = []
  ) {
    super(message);
    this.name = "DocumentValidationError";
    this.issues = issues;
    this.warnings = warnings;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["ChemKED validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${formatIssue(issue)}`);
    }
    for (const warning of this.warnings) {
      lines.push(`  WARNING ${formatWarning(warning)}`);
    }
    return lines.join("\n");
  }
}

import { formatIssue, type ValidationIssue } from "../validation/issues.js";

/**
 * Raised when text cannot be turned into a raw document at all
 * (bad YAML, CRLF line endings, custom tags, recursive aliases).
 */
export class DocumentParseError extends Error {
  public readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "DocumentParseError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${formatIssue(issue)}`);
    }
    return lines.join("\n");
  }
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * DOCUMENT VALIDATOR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Runs every check on a raw document and returns the complete list of
 * problems:
 *
 *   1. normalize (common-properties consumed, data points copied apart)
 *   2. schema: structural and semantic rules, decoded into ChemKEDData
 *   3. apparatus gating on the normalized document
 *   4. registry checks through the injected RegistryLookup
 *
 * Validation never stops at the first error and never throws for a bad
 * document. Without a lookup the registry step is skipped.
 */

import { z } from "zod";

import { normalizeDocument } from "../document/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { RegistryLookup } from "../lookup/index.js";
import {
  createChemKEDSchema,
  RuleParamsSchema,
  type ChemKEDData,
  type SchemaOptions,
} from "../schema/index.js";
import { checkApparatusGating, findDeprecatedFields } from "./apparatus.js";
import {
  formatWarning,
  joinPath,
  type LookupWarning,
  type ValidationIssue,
} from "./issues.js";
import { RegistryChecker } from "./registry-checks.js";

export interface ValidationResult {
  success: boolean;
  /** Decoded document; present when the schema accepted it */
  data?: ChemKEDData;
  errors: ValidationIssue[];
  warnings: LookupWarning[];
}

export interface DocumentValidatorOptions {
  /** Registry collaborator for ORCID and DOI checks */
  lookup?: RegistryLookup;
  logger?: Logger;
  /** Upper bound for reference.year; defaults to next calendar year */
  maxYear?: number;
}

/**
 * Sort a zod issue into the structural/semantic taxonomy.
 */
export function toValidationIssue(issue: z.ZodIssue): ValidationIssue {
  const path = joinPath(issue.path);
  switch (issue.code) {
    case z.ZodIssueCode.custom: {
      const params = RuleParamsSchema.safeParse(issue.params);
      return params.success
        ? { path, message: issue.message, kind: params.data.kind, rule: params.data.rule }
        : { path, message: issue.message, kind: "structural", rule: "type" };
    }
    case z.ZodIssueCode.invalid_enum_value:
    case z.ZodIssueCode.invalid_literal:
      return { path, message: issue.message, kind: "semantic", rule: "enumeration" };
    default:
      return { path, message: issue.message, kind: "structural", rule: issue.code };
  }
}

function deprecationWarnings(document: unknown): LookupWarning[] {
  return findDeprecatedFields(document).map((found) => ({
    code: "deprecated_field" as const,
    ...found,
  }));
}

/**
 * Decode a document without semantic or registry rules, for input that is
 * already trusted. Structural problems still fail the decode.
 */
export function decodeDocument(raw: unknown, options: Partial<SchemaOptions> = {}): ValidationResult {
  const normalized = normalizeDocument(raw);
  const schema = createChemKEDSchema({ semanticChecks: false, ...options });
  const parsed = schema.safeParse(normalized.document);
  const warnings = [...normalized.warnings, ...deprecationWarnings(normalized.document)];
  if (!parsed.success) {
    return { success: false, errors: parsed.error.issues.map(toValidationIssue), warnings };
  }
  return { success: true, data: parsed.data, errors: [], warnings };
}

export class DocumentValidator {
  private readonly lookup: RegistryLookup | undefined;
  private readonly logger: Logger;
  private readonly maxYear: number | undefined;

  constructor(options: DocumentValidatorOptions = {}) {
    this.lookup = options.lookup;
    this.logger = options.logger ?? silentLogger;
    this.maxYear = options.maxYear;
  }

  async validate(raw: unknown): Promise<ValidationResult> {
    const normalized = normalizeDocument(raw);
    const document = normalized.document;

    const schema = createChemKEDSchema({
      semanticChecks: true,
      ...(this.maxYear !== undefined && { maxYear: this.maxYear }),
    });
    const parsed = schema.safeParse(document);

    const errors: ValidationIssue[] = parsed.success
      ? []
      : parsed.error.issues.map(toValidationIssue);
    errors.push(...checkApparatusGating(document));

    const warnings = [...normalized.warnings, ...deprecationWarnings(document)];

    if (this.lookup) {
      const registry = await new RegistryChecker(this.lookup).check(document);
      errors.push(...registry.errors);
      warnings.push(...registry.warnings);
    }

    for (const warning of warnings) {
      this.logger.warn(formatWarning(warning));
    }
    this.logger.debug("Validation finished", {
      errors: errors.length,
      warnings: warnings.length,
    });

    const success = errors.length === 0;
    return {
      success,
      ...(success && parsed.success && { data: parsed.data }),
      errors,
      warnings,
    };
  }
}

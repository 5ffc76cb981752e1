/**
 * Shared plumbing for the ChemKED zod schemas.
 *
 * Custom issues carry `params: { kind, rule }` so the validator can sort
 * them into structural and semantic errors. Semantic rules are only
 * reported when the schema was built with `semanticChecks` on.
 *
 * Structural issues raised from transforms and refinements are fatal: the
 * enclosing node is aborted and its own refinements never see a
 * half-decoded value.
 */

import { z } from "zod";

import type { IssueKind } from "../validation/issues.js";

export interface SchemaOptions {
  /** Report semantic rules (dimensions, bounds, sums, checksums). */
  semanticChecks: boolean;
  /** Upper bound for `reference.year`. Defaults to next calendar year. */
  maxYear?: number;
}

export const RuleParamsSchema = z.object({
  kind: z.enum(["structural", "semantic"]),
  rule: z.string(),
});
export type RuleParams = z.infer<typeof RuleParamsSchema>;

export type IssuePath = Array<string | number>;

export function reportIssue(
  ctx: z.RefinementCtx,
  kind: IssueKind,
  rule: string,
  message: string,
  path: IssuePath = []
): void {
  const params: RuleParams = { kind, rule };
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message,
    path,
    params,
    fatal: kind === "structural",
  });
}

export function reportStructural(
  ctx: z.RefinementCtx,
  rule: string,
  message: string,
  path: IssuePath = []
): void {
  reportIssue(ctx, "structural", rule, message, path);
}

export function reportSemantic(
  ctx: z.RefinementCtx,
  options: SchemaOptions,
  rule: string,
  message: string,
  path: IssuePath = []
): void {
  if (options.semanticChecks) {
    reportIssue(ctx, "semantic", rule, message, path);
  }
}

export function reportRequired(ctx: z.RefinementCtx, path: IssuePath = []): void {
  ctx.addIssue({
    code: z.ZodIssueCode.invalid_type,
    expected: z.ZodParsedType.unknown,
    received: z.ZodParsedType.undefined,
    message: "Required",
    path,
    fatal: true,
  });
}

/** A YAML scalar that may hold a number, with or without units. */
export const ScalarSchema = z.custom<string | number>(
  (value) => typeof value === "string" || typeof value === "number",
  { message: "Expected a number or a string with units" }
);

/** Forward the issues of a nested parse into the enclosing context. */
export function forwardIssues(ctx: z.RefinementCtx, error: z.ZodError, prefix: IssuePath): void {
  for (const issue of error.issues) {
    ctx.addIssue({ ...issue, path: [...prefix, ...issue.path], fatal: true });
  }
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * VALUE-WITH-UNCERTAINTY NODES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Physical values appear in three raw shapes:
 *
 *   temperature: 297.4 K
 *   temperature: [297.4 K]
 *   temperature:
 *     - 297.4 K
 *     - uncertainty-type: absolute
 *       uncertainty: 5 K                  (or upper-/lower-uncertainty)
 *
 * The schema decodes them into a tagged {@link ValueNode} so later stages
 * match on `tag` instead of re-inspecting the raw input.
 */

import { z } from "zod";

import {
  convertMagnitude,
  DIMENSIONLESS,
  hasKind,
  isDimensionless,
  isKnownUnits,
  parseValueText,
  REFERENCE_UNITS,
  sameDimension,
  type ParsedValue,
  type PhysicalKind,
  type UncertaintyKind,
} from "../units/index.js";
import {
  forwardIssues,
  reportRequired,
  reportSemantic,
  reportStructural,
  ScalarSchema,
  type IssuePath,
  type SchemaOptions,
} from "./context.js";
import { UncertaintyTypeSchema } from "./enums.js";

export type ValueNode =
  | { readonly tag: "bare"; readonly value: ParsedValue }
  | {
      readonly tag: "symmetric";
      readonly value: ParsedValue;
      readonly uncertaintyType: UncertaintyKind;
      readonly uncertainty: ParsedValue;
    }
  | {
      readonly tag: "asymmetric";
      readonly value: ParsedValue;
      readonly uncertaintyType: UncertaintyKind;
      readonly upper: ParsedValue;
      readonly lower: ParsedValue;
    };

export interface ValueFieldOptions {
  kind: PhysicalKind;
  /** Magnitude must be strictly greater than zero. */
  positive?: boolean;
}

const UncertaintySpecSchema = z
  .object({
    "uncertainty-type": UncertaintyTypeSchema,
    uncertainty: ScalarSchema.optional(),
    "upper-uncertainty": ScalarSchema.optional(),
    "lower-uncertainty": ScalarSchema.optional(),
  })
  .strict();

function parseScalar(
  input: string | number,
  ctx: z.RefinementCtx,
  path: IssuePath
): ParsedValue | null {
  if (typeof input === "number") {
    return { magnitude: input, units: DIMENSIONLESS };
  }
  const parsed = parseValueText(input);
  if (!parsed) {
    reportStructural(ctx, "value_format", `Expected a number followed by units, got "${input}"`, path);
  }
  return parsed;
}

type UncertaintyPart =
  | { tag: "symmetric"; uncertaintyType: UncertaintyKind; uncertainty: ParsedValue }
  | { tag: "asymmetric"; uncertaintyType: UncertaintyKind; upper: ParsedValue; lower: ParsedValue };

function decodeUncertainty(raw: unknown, ctx: z.RefinementCtx): UncertaintyPart | null {
  const result = UncertaintySpecSchema.safeParse(raw);
  if (!result.success) {
    forwardIssues(ctx, result.error, [1]);
    return null;
  }
  const spec = result.data;
  const uncertaintyType = spec["uncertainty-type"];
  const symmetric = spec.uncertainty;
  const upper = spec["upper-uncertainty"];
  const lower = spec["lower-uncertainty"];

  if (symmetric !== undefined) {
    if (upper !== undefined || lower !== undefined) {
      reportStructural(
        ctx,
        "exclusive_uncertainty",
        "uncertainty cannot be combined with upper-uncertainty or lower-uncertainty",
        [1, "uncertainty"]
      );
      return null;
    }
    const uncertainty = parseScalar(symmetric, ctx, [1, "uncertainty"]);
    return uncertainty ? { tag: "symmetric", uncertaintyType, uncertainty } : null;
  }

  if (upper === undefined && lower === undefined) {
    reportStructural(
      ctx,
      "uncertainty_required",
      "Either uncertainty or both upper-uncertainty and lower-uncertainty are required",
      [1]
    );
    return null;
  }
  if (upper === undefined || lower === undefined) {
    const [present, missing] =
      upper === undefined
        ? ["lower-uncertainty", "upper-uncertainty"]
        : ["upper-uncertainty", "lower-uncertainty"];
    reportStructural(ctx, "uncertainty_dependency", `${present} requires ${missing}`, [1, present]);
    return null;
  }

  const upperValue = parseScalar(upper, ctx, [1, "upper-uncertainty"]);
  const lowerValue = parseScalar(lower, ctx, [1, "lower-uncertainty"]);
  if (!upperValue || !lowerValue) return null;
  return { tag: "asymmetric", uncertaintyType, upper: upperValue, lower: lowerValue };
}

function decodeValueNode(input: unknown, ctx: z.RefinementCtx): ValueNode | null {
  if (input === undefined) {
    reportRequired(ctx);
    return null;
  }
  if (typeof input === "string" || typeof input === "number") {
    const value = parseScalar(input, ctx, []);
    return value ? { tag: "bare", value } : null;
  }
  if (!Array.isArray(input) || input.length === 0 || input.length > 2) {
    reportStructural(
      ctx,
      "value_format",
      'Expected a value such as "297.4 K" or a [value, uncertainty] list'
    );
    return null;
  }

  const [first, second] = input;
  if (typeof first !== "string" && typeof first !== "number") {
    reportStructural(ctx, "value_format", "Expected a number or a string with units", [0]);
    return null;
  }
  const value = parseScalar(first, ctx, [0]);
  if (input.length === 1) {
    return value ? { tag: "bare", value } : null;
  }
  const uncertainty = decodeUncertainty(second, ctx);
  if (!value || !uncertainty) return null;
  return { ...uncertainty, value };
}

function checkUnits(
  units: string,
  kind: PhysicalKind,
  ctx: z.RefinementCtx,
  options: SchemaOptions,
  path: IssuePath
): void {
  if (!isDimensionless(units) && !isKnownUnits(units)) {
    reportSemantic(ctx, options, "unit_dimension", `Unrecognized units "${units}"`, path);
  } else if (!hasKind(units, kind)) {
    const expected =
      kind === "dimensionless" ? "a dimensionless value" : `units compatible with ${REFERENCE_UNITS[kind]}`;
    reportSemantic(
      ctx,
      options,
      "unit_dimension",
      `Incompatible units "${units}" for a ${kind} value: expected ${expected}`,
      path
    );
  }
}

function checkUncertaintyValue(
  node: ValueNode,
  uncertainty: ParsedValue,
  ctx: z.RefinementCtx,
  options: SchemaOptions,
  path: IssuePath
): void {
  if (node.tag === "bare") return;
  if (uncertainty.magnitude < 0) {
    reportSemantic(ctx, options, "positive", "Uncertainty must not be negative", path);
  }
  if (node.uncertaintyType === "relative") {
    if (!isDimensionless(uncertainty.units)) {
      reportSemantic(
        ctx,
        options,
        "uncertainty_dimension",
        `Relative uncertainty must be dimensionless, got "${uncertainty.units}"`,
        path
      );
    }
  } else if (!sameDimension(uncertainty.units, node.value.units)) {
    reportSemantic(
      ctx,
      options,
      "uncertainty_dimension",
      `Absolute uncertainty units "${uncertainty.units}" do not match value units "${node.value.units}"`,
      path
    );
  }
}

/**
 * Magnitude on the kind's reference scale, so that offset units such as
 * degC are judged in kelvin. Units that cannot be converted are left as given.
 */
function magnitudeInReference(value: ParsedValue, kind: PhysicalKind): number {
  if (isDimensionless(value.units) || !isKnownUnits(value.units) || !hasKind(value.units, kind)) {
    return value.magnitude;
  }
  return convertMagnitude(value.magnitude, value.units, REFERENCE_UNITS[kind]);
}

function checkValueNode(
  node: ValueNode,
  field: ValueFieldOptions,
  ctx: z.RefinementCtx,
  options: SchemaOptions
): void {
  const valuePath: IssuePath = node.tag === "bare" ? [] : [0];
  checkUnits(node.value.units, field.kind, ctx, options, valuePath);
  if (field.positive && !(magnitudeInReference(node.value, field.kind) > 0)) {
    reportSemantic(
      ctx,
      options,
      "positive",
      `Value must be greater than zero, got ${node.value.magnitude}`,
      valuePath
    );
  }

  switch (node.tag) {
    case "bare":
      return;
    case "symmetric":
      checkUncertaintyValue(node, node.uncertainty, ctx, options, [1, "uncertainty"]);
      return;
    case "asymmetric":
      checkUncertaintyValue(node, node.upper, ctx, options, [1, "upper-uncertainty"]);
      checkUncertaintyValue(node, node.lower, ctx, options, [1, "lower-uncertainty"]);
      return;
  }
}

/**
 * Schema for one value-with-uncertainty field of the given physical kind.
 */
export function valueField(options: SchemaOptions, field: ValueFieldOptions) {
  return z.unknown().transform((input, ctx): ValueNode => {
    const node = decodeValueNode(input, ctx);
    if (!node) return z.NEVER;
    checkValueNode(node, field, ctx, options);
    return node;
  });
}

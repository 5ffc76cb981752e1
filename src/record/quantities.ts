/**
 * ValueNode → Quantity.
 *
 * Asymmetric uncertainty is collapsed to the larger of the two bounds,
 * converted to the value's units. The simplification is reported as an
 * `asymmetric_uncertainty` warning so callers can see where it happened.
 */

import type { ValueNode } from "../schema/index.js";
import { convertDelta, Quantity, type ParsedValue, type Uncertainty } from "../units/index.js";
import type { LookupWarning } from "../validation/index.js";

export const ASYMMETRIC_UNCERTAINTY_MESSAGE =
  "Asymmetric uncertainties are not supported. The maximum of lower-uncertainty and " +
  "upper-uncertainty has been used as the symmetric uncertainty.";

function uncertaintyMagnitude(
  kind: "absolute" | "relative",
  uncertainty: ParsedValue,
  valueUnits: string
): number {
  if (kind === "relative") return uncertainty.magnitude;
  return convertDelta(uncertainty.magnitude, uncertainty.units, valueUnits);
}

function buildUncertainty(kind: "absolute" | "relative", value: number): Uncertainty {
  return kind === "absolute" ? { kind: "absolute", value } : { kind: "relative", value };
}

export function toQuantity(node: ValueNode, path: string, warnings: LookupWarning[]): Quantity {
  const { magnitude, units } = node.value;
  switch (node.tag) {
    case "bare":
      return new Quantity(magnitude, units);
    case "symmetric":
      return new Quantity(
        magnitude,
        units,
        buildUncertainty(
          node.uncertaintyType,
          uncertaintyMagnitude(node.uncertaintyType, node.uncertainty, units)
        )
      );
    case "asymmetric": {
      const upper = uncertaintyMagnitude(node.uncertaintyType, node.upper, units);
      const lower = uncertaintyMagnitude(node.uncertaintyType, node.lower, units);
      warnings.push({ code: "asymmetric_uncertainty", path, message: ASYMMETRIC_UNCERTAINTY_MESSAGE });
      return new Quantity(magnitude, units, buildUncertainty(node.uncertaintyType, Math.max(upper, lower)));
    }
  }
}

/**
 * Document form of a quantity: `["297.4 K"]` or
 * `["297.4 K", {uncertainty-type, uncertainty}]`.
 */
export function quantityToDocument(quantity: Quantity): unknown[] {
  const value = quantity.toString();
  const uncertainty = quantity.uncertainty;
  if (!uncertainty) return [value];
  const amount =
    uncertainty.kind === "absolute"
      ? new Quantity(uncertainty.value, quantity.units).toString()
      : uncertainty.value;
  return [value, { "uncertainty-type": uncertainty.kind, uncertainty: amount }];
}

/** Composition amounts are written as numbers, never as strings. */
export function amountToDocument(quantity: Quantity): unknown[] {
  const uncertainty = quantity.uncertainty;
  if (!uncertainty) return [quantity.magnitude];
  return [quantity.magnitude, { "uncertainty-type": uncertainty.kind, uncertainty: uncertainty.value }];
}

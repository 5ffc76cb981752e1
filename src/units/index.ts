/**
 * Units and physical quantities.
 */

export {
  DIMENSIONLESS,
  REFERENCE_UNITS,
  UnitError,
  assertKnownUnits,
  convertDelta,
  convertMagnitude,
  hasKind,
  isDimensionless,
  isKnownUnits,
  normalizeUnits,
  sameDimension,
  type PhysicalKind,
} from "./registry.js";
export {
  Quantity,
  parseValueText,
  type ParsedValue,
  type Uncertainty,
  type UncertaintyKind,
} from "./quantity.js";

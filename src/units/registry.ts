/**
 * ═══════════════════════════════════════════════════════════════════════════
 * UNIT REGISTRY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Dimensional analysis for the unit tokens found in ChemKED and ReSpecTh
 * documents. Parsing and conversion are delegated to a private mathjs
 * instance; this module only normalizes spellings and maps each physical
 * kind onto its reference unit.
 *
 * Spellings accepted on top of mathjs syntax:
 *   - `**` as the power operator (`m**3`)
 *   - a trailing digit as a power (`cm3`)
 *   - `Torr` for `torr`
 *   - `1/s` for `s^-1`
 *   - `dimensionless` (or an empty string) for a unitless value
 */

import { all, create, type Unit } from "mathjs";

const math = create(all, {});

/** Unit token used for unitless values. */
export const DIMENSIONLESS = "dimensionless";

export class UnitError extends Error {
  constructor(
    message: string,
    public readonly units: string
  ) {
    super(message);
    this.name = "UnitError";
  }
}

/**
 * Physical kinds a field may declare, mapped to the unit whose dimension
 * every value of that kind must share.
 */
export const REFERENCE_UNITS = {
  temperature: "K",
  pressure: "Pa",
  time: "s",
  "pressure-rise": "1/s",
  volume: "m^3",
  length: "m",
  dimensionless: DIMENSIONLESS,
} as const;

export type PhysicalKind = keyof typeof REFERENCE_UNITS;

export function isDimensionless(units: string): boolean {
  const trimmed = units.trim();
  return trimmed === "" || trimmed === DIMENSIONLESS;
}

/**
 * Rewrite a unit token into the syntax mathjs parses.
 */
export function normalizeUnits(units: string): string {
  const normalized = units
    .trim()
    .replace(/\*\*/g, "^")
    .replace(/\bTorr\b/g, "torr")
    .replace(/([A-Za-z])(\d+)\b/g, "$1^$2");
  const inverse = /^1\s*\/\s*([A-Za-z]+)$/.exec(normalized);
  return inverse ? `${inverse[1]}^-1` : normalized;
}

function toUnit(value: number, units: string): Unit {
  try {
    return math.unit(value, normalizeUnits(units));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UnitError(`Unrecognized units "${units}": ${reason}`, units);
  }
}

/**
 * Throws UnitError when the token is not a unit mathjs (or the
 * dimensionless spelling) understands.
 */
export function assertKnownUnits(units: string): void {
  if (!isDimensionless(units)) {
    toUnit(1, units);
  }
}

export function isKnownUnits(units: string): boolean {
  try {
    assertKnownUnits(units);
    return true;
  } catch (err) {
    if (err instanceof UnitError) return false;
    throw err;
  }
}

/**
 * True when both tokens describe the same physical dimension.
 * Unknown units are never compatible with anything.
 */
export function sameDimension(a: string, b: string): boolean {
  const aless = isDimensionless(a);
  const bless = isDimensionless(b);
  if (aless || bless) {
    return aless && bless;
  }
  if (!isKnownUnits(a) || !isKnownUnits(b)) {
    return false;
  }
  return toUnit(1, a).equalBase(toUnit(1, b));
}

export function hasKind(units: string, kind: PhysicalKind): boolean {
  return sameDimension(units, REFERENCE_UNITS[kind]);
}

/**
 * Convert a magnitude between two units of the same dimension.
 * Offset scales (degC, degF) are handled.
 */
export function convertMagnitude(value: number, from: string, to: string): number {
  if (isDimensionless(from) && isDimensionless(to)) {
    return value;
  }
  if (!sameDimension(from, to)) {
    throw new UnitError(`Cannot convert from "${from}" to "${to}"`, from);
  }
  return toUnit(value, from).toNumber(normalizeUnits(to));
}

/**
 * Convert a difference (such as an absolute uncertainty) between units.
 * Unlike {@link convertMagnitude}, offsets cancel out.
 */
export function convertDelta(delta: number, from: string, to: string): number {
  return convertMagnitude(delta, from, to) - convertMagnitude(0, from, to);
}

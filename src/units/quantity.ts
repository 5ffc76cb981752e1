/**
 * Physical quantity with an optional symmetric uncertainty.
 */

import {
  DIMENSIONLESS,
  UnitError,
  assertKnownUnits,
  convertDelta,
  convertMagnitude,
  isDimensionless,
  sameDimension,
} from "./registry.js";

export type UncertaintyKind = "absolute" | "relative";

/**
 * Absolute uncertainties are stored in the units of the quantity they
 * belong to; relative ones are a plain fraction.
 */
export type Uncertainty =
  | { readonly kind: "absolute"; readonly value: number }
  | { readonly kind: "relative"; readonly value: number };

const VALUE_PATTERN = /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)\s*(.*?)\s*$/;

export interface ParsedValue {
  magnitude: number;
  units: string;
}

/**
 * Split a `"297.4 K"` style token into magnitude and units.
 * Returns null when the text does not start with a number.
 */
export function parseValueText(text: string): ParsedValue | null {
  const match = VALUE_PATTERN.exec(text);
  if (!match) return null;
  const magnitude = Number(match[1]);
  if (!Number.isFinite(magnitude)) return null;
  const units = match[2] === "" ? DIMENSIONLESS : match[2];
  return { magnitude, units };
}

export class Quantity {
  readonly magnitude: number;
  readonly units: string;
  readonly uncertainty: Uncertainty | undefined;

  constructor(magnitude: number, units: string = DIMENSIONLESS, uncertainty?: Uncertainty) {
    assertKnownUnits(units);
    if (uncertainty && !Number.isFinite(uncertainty.value)) {
      throw new RangeError(`Uncertainty must be a finite number, got ${uncertainty.value}`);
    }
    this.magnitude = magnitude;
    this.units = isDimensionless(units) ? DIMENSIONLESS : units.trim();
    this.uncertainty = uncertainty ? Object.freeze({ ...uncertainty }) : undefined;
    Object.freeze(this);
  }

  /**
   * Parse `"297.4 K"`; a bare number is dimensionless.
   */
  static parse(text: string | number, uncertainty?: Uncertainty): Quantity {
    if (typeof text === "number") {
      return new Quantity(text, DIMENSIONLESS, uncertainty);
    }
    const parsed = parseValueText(text);
    if (!parsed) {
      throw new UnitError(`Cannot parse a quantity from "${text}"`, text);
    }
    return new Quantity(parsed.magnitude, parsed.units, uncertainty);
  }

  /**
   * Build an absolute uncertainty from a value carrying its own units,
   * expressed in the units of `units`.
   */
  static absoluteUncertainty(value: number, valueUnits: string, units: string): Uncertainty {
    if (!sameDimension(valueUnits, units)) {
      throw new UnitError(
        `Uncertainty units "${valueUnits}" do not match quantity units "${units}"`,
        valueUnits
      );
    }
    return { kind: "absolute", value: convertDelta(value, valueUnits, units) };
  }

  isCompatibleWith(units: string): boolean {
    return sameDimension(this.units, units);
  }

  /** Magnitude in another unit; the quantity itself is unchanged. */
  magnitudeIn(units: string): number {
    return convertMagnitude(this.magnitude, this.units, units);
  }

  /**
   * Converted copy. Absolute uncertainty is converted as a difference so
   * offset scales do not shift it.
   */
  to(units: string): Quantity {
    const magnitude = this.magnitudeIn(units);
    let uncertainty = this.uncertainty;
    if (uncertainty?.kind === "absolute") {
      uncertainty = { kind: "absolute", value: convertDelta(uncertainty.value, this.units, units) };
    }
    return new Quantity(magnitude, units, uncertainty);
  }

  withUncertainty(uncertainty: Uncertainty | undefined): Quantity {
    return new Quantity(this.magnitude, this.units, uncertainty);
  }

  /** Absolute uncertainty in this quantity's units, whichever kind was given. */
  get absoluteUncertainty(): number | undefined {
    if (!this.uncertainty) return undefined;
    return this.uncertainty.kind === "absolute"
      ? this.uncertainty.value
      : Math.abs(this.magnitude) * this.uncertainty.value;
  }

  /** Relative uncertainty as a fraction of the magnitude. */
  get relativeUncertainty(): number | undefined {
    if (!this.uncertainty) return undefined;
    if (this.uncertainty.kind === "relative") return this.uncertainty.value;
    return this.magnitude === 0 ? undefined : this.uncertainty.value / Math.abs(this.magnitude);
  }

  /** `"297.4 K"`; dimensionless quantities print as the bare number. */
  toString(): string {
    return this.units === DIMENSIONLESS
      ? String(this.magnitude)
      : `${this.magnitude} ${this.units}`;
  }
}

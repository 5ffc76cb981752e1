/**
 * ═══════════════════════════════════════════════════════════════════════════
 * COMPOSITION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Species amounts in the basis the document used, plus conversions:
 *
 *   mole percent  → mole fraction   x = X / 100
 *   mole fraction → mass fraction   y_i = x_i M_i / Σ x_j M_j
 *   mass fraction → mole fraction   x_i = (y_i / M_i) / Σ (y_j / M_j)
 *
 * Molecular weights M come from each species' identity and are only
 * computed when a conversion needs them.
 *
 * Simulator-ready strings look like "H2:0.125, O2:0.0625". A species
 * conversion map renames species on the way out; its keys may be a
 * species name, InChI or SMILES.
 */

import type { CompositionData, CompositionKind, SpeciesIdentity } from "../schema/index.js";
import { Quantity } from "../units/index.js";
import type { LookupWarning } from "../validation/index.js";
import { deepFreeze } from "./freeze.js";
import { molecularWeight } from "./molecular-weight.js";
import { amountToDocument, toQuantity } from "./quantities.js";

export type FractionBasis = "mole" | "mass";

export type SpeciesConversion = Readonly<Record<string, string>>;

export class Species {
  readonly name: string;
  readonly identity: SpeciesIdentity;
  readonly amount: Quantity;

  constructor(name: string, identity: SpeciesIdentity, amount: Quantity) {
    this.name = name;
    this.identity = identity;
    this.amount = amount;
    deepFreeze(this);
  }

  get inchi(): string | undefined {
    return this.identity.kind === "InChI" ? this.identity.value : undefined;
  }

  get smiles(): string | undefined {
    return this.identity.kind === "SMILES" ? this.identity.value : undefined;
  }

  /** g/mol */
  get molecularWeight(): number {
    return molecularWeight(this.identity, this.name);
  }

  /** Keys a species conversion map may use for this species. */
  get keys(): string[] {
    const keys = [this.name];
    if (this.identity.kind !== "atomic-composition") keys.push(this.identity.value);
    return keys;
  }

  toDocument(): Record<string, unknown> {
    const identity =
      this.identity.kind === "atomic-composition"
        ? { "atomic-composition": this.identity.elements.map((entry) => ({ ...entry })) }
        : { [this.identity.kind]: this.identity.value };
    return { "species-name": this.name, ...identity, amount: amountToDocument(this.amount) };
  }
}

function normalize(values: number[]): number[] {
  const total = values.reduce((sum, value) => sum + value, 0);
  return values.map((value) => value / total);
}

export class Composition {
  readonly kind: CompositionKind;
  readonly species: readonly Species[];

  constructor(kind: CompositionKind, species: readonly Species[]) {
    this.kind = kind;
    this.species = species;
    deepFreeze(this);
  }

  static fromData(data: CompositionData, path: string, warnings: LookupWarning[]): Composition {
    const species = data.species.map(
      (entry, index) =>
        new Species(
          entry.name,
          entry.identity,
          toQuantity(entry.amount, `${path}.species.${index}.amount`, warnings)
        )
    );
    return new Composition(data.kind, species);
  }

  private amounts(): number[] {
    return this.species.map((species) => species.amount.magnitude);
  }

  private weights(): number[] {
    return this.species.map((species) => species.molecularWeight);
  }

  /** Mole fractions, in species order. */
  moleFractions(): number[] {
    switch (this.kind) {
      case "mole fraction":
        return this.amounts();
      case "mole percent":
        return this.amounts().map((amount) => amount / 100);
      case "mass fraction": {
        const weights = this.weights();
        return normalize(this.amounts().map((amount, i) => amount / (weights[i] ?? NaN)));
      }
    }
  }

  /** Mass fractions, in species order. */
  massFractions(): number[] {
    if (this.kind === "mass fraction") {
      return this.amounts();
    }
    const weights = this.weights();
    return normalize(this.moleFractions().map((fraction, i) => fraction * (weights[i] ?? NaN)));
  }

  fractions(basis: FractionBasis): number[] {
    return basis === "mole" ? this.moleFractions() : this.massFractions();
  }

  /**
   * "H2:0.125, O2:0.0625" in the requested basis.
   */
  toFractionString(basis: FractionBasis, speciesConversion?: SpeciesConversion): string {
    const names = this.outputNames(speciesConversion);
    const fractions = this.fractions(basis);
    return names.map((name, i) => `${name}:${String(fractions[i])}`).join(", ");
  }

  private outputNames(speciesConversion: SpeciesConversion | undefined): string[] {
    if (!speciesConversion) {
      return this.species.map((species) => species.name);
    }
    const used = new Set<string>();
    const names = this.species.map((species) => {
      const key = species.keys.find((candidate) => Object.hasOwn(speciesConversion, candidate));
      if (key === undefined) return species.name;
      used.add(key);
      return speciesConversion[key] ?? species.name;
    });
    const unknown = Object.keys(speciesConversion).filter((key) => !used.has(key));
    if (unknown.length > 0) {
      throw new RangeError(`Unrecognized species in species conversion: ${unknown.join(", ")}`);
    }
    return names;
  }

  toDocument(): Record<string, unknown> {
    return { kind: this.kind, species: this.species.map((species) => species.toDocument()) };
  }
}

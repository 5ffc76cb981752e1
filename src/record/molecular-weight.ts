/**
 * Molecular weights from a species' identity: an explicit atomic
 * composition, the formula layer of an InChI, or a SMILES string.
 *
 * Atomic weights are read once from data/atomic-weights.json.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import type { SpeciesIdentity } from "../schema/index.js";
import { MolecularWeightError } from "./errors.js";
import { parseSmiles, SmilesParseError, type ElementCounts } from "./smiles.js";

const AtomicWeightsSchema = z.object({
  units: z.literal("g/mol"),
  elements: z.record(z.number().positive()),
});

let cachedWeights: ReadonlyMap<string, number> | undefined;

export function atomicWeights(): ReadonlyMap<string, number> {
  if (!cachedWeights) {
    const text = readFileSync(new URL("../../data/atomic-weights.json", import.meta.url), "utf-8");
    const data = AtomicWeightsSchema.parse(JSON.parse(text));
    cachedWeights = new Map(Object.entries(data.elements));
  }
  return cachedWeights;
}

const ELEMENT_COUNT = /([A-Z][a-z]?)(\d*)/g;

/**
 * Element counts of a Hill formula; `.`-separated components may carry a
 * leading multiplier (`2H2O.Na`).
 */
export function parseFormula(formula: string): ElementCounts {
  const counts: ElementCounts = new Map();
  for (const component of formula.split(".")) {
    const match = /^(\d*)(.*)$/.exec(component);
    const multiplier = match?.[1] ? Number(match[1]) : 1;
    const body = match?.[2] ?? "";
    for (const [, element = "", count] of body.matchAll(ELEMENT_COUNT)) {
      const amount = (count ? Number(count) : 1) * multiplier;
      counts.set(element, (counts.get(element) ?? 0) + amount);
    }
  }
  return counts;
}

/** Formula layer of an InChI: `InChI=1S/C2H6O/c1-2-3/h3H,2H2,1H3` → `C2H6O`. */
export function inchiFormula(inchi: string): string {
  const layers = inchi.replace(/^InChI=/, "").split("/");
  return layers[1] ?? "";
}

export function elementCounts(identity: SpeciesIdentity): ElementCounts {
  switch (identity.kind) {
    case "atomic-composition":
      return new Map(identity.elements.map((entry) => [entry.element, entry.amount]));
    case "InChI":
      return parseFormula(inchiFormula(identity.value));
    case "SMILES":
      return parseSmiles(identity.value);
  }
}

/**
 * Molecular weight in g/mol.
 */
export function molecularWeight(identity: SpeciesIdentity, species: string): number {
  let counts: ElementCounts;
  try {
    counts = elementCounts(identity);
  } catch (err) {
    if (err instanceof SmilesParseError) {
      throw new MolecularWeightError(`Cannot read SMILES for ${species}: ${err.message}`, species);
    }
    throw err;
  }
  if (counts.size === 0) {
    throw new MolecularWeightError(`No elements found for ${species}`, species);
  }

  const weights = atomicWeights();
  let total = 0;
  for (const [element, count] of counts) {
    const weight = weights.get(element);
    if (weight === undefined) {
      throw new MolecularWeightError(`Unknown element "${element}" in ${species}`, species);
    }
    total += weight * count;
  }
  return total;
}

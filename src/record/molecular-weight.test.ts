/**
 * Tests for element counting and molecular weights.
 *
 * Run: node --import tsx --test src/record/molecular-weight.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { MolecularWeightError } from "./errors.js";
import { elementCounts, inchiFormula, molecularWeight, parseFormula } from "./molecular-weight.js";
import { parseSmiles, SmilesParseError } from "./smiles.js";

function assertClose(actual: number, expected: number, atol = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= atol, `expected ${actual} to be close to ${expected}`);
}

function counts(map: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...map.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMULAS
// ═══════════════════════════════════════════════════════════════════════════

describe("formulas", () => {
  test("reads the formula layer of an InChI", () => {
    assert.equal(inchiFormula("InChI=1S/C2H6O/c1-2-3/h3H,2H2,1H3"), "C2H6O");
    assert.equal(inchiFormula("1S/Ar"), "Ar");
  });

  test("counts elements in a Hill formula", () => {
    assert.deepEqual(counts(parseFormula("C2H6O")), { C: 2, H: 6, O: 1 });
    assert.deepEqual(counts(parseFormula("CH4.2H2O")), { C: 1, H: 8, O: 2 });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SMILES
// ═══════════════════════════════════════════════════════════════════════════

describe("SMILES", () => {
  test("adds implicit hydrogens to the organic subset", () => {
    assert.deepEqual(counts(parseSmiles("CCO")), { C: 2, H: 6, O: 1 });
    assert.deepEqual(counts(parseSmiles("CC(C)C")), { C: 4, H: 10 });
    assert.deepEqual(counts(parseSmiles("O=C=O")), { C: 1, O: 2 });
    assert.deepEqual(counts(parseSmiles("C#N")), { C: 1, H: 1, N: 1 });
  });

  test("handles aromatic rings", () => {
    assert.deepEqual(counts(parseSmiles("c1ccccc1")), { C: 6, H: 6 });
  });

  test("bracket atoms carry only their explicit hydrogens", () => {
    assert.deepEqual(counts(parseSmiles("[H][H]")), { H: 2 });
    assert.deepEqual(counts(parseSmiles("[Ar]")), { Ar: 1 });
    assert.deepEqual(counts(parseSmiles("[OH-]")), { H: 1, O: 1 });
  });

  test("rejects unbalanced branches", () => {
    assert.throws(() => parseSmiles("C(C"), SmilesParseError);
    assert.throws(() => parseSmiles("C)C"), SmilesParseError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// MOLECULAR WEIGHT
// ═══════════════════════════════════════════════════════════════════════════

describe("molecularWeight", () => {
  test("uses the InChI formula", () => {
    assertClose(molecularWeight({ kind: "InChI", value: "1S/H2/h1H" }, "H2"), 2.016);
    assertClose(molecularWeight({ kind: "InChI", value: "1S/Ar" }, "Ar"), 39.948);
  });

  test("uses SMILES", () => {
    assertClose(molecularWeight({ kind: "SMILES", value: "CCO" }, "ethanol"), 46.069);
  });

  test("uses an explicit atomic composition", () => {
    const identity = {
      kind: "atomic-composition",
      elements: [
        { element: "C", amount: 1 },
        { element: "H", amount: 4 },
      ],
    } as const;
    assert.deepEqual(counts(elementCounts(identity)), { C: 1, H: 4 });
    assertClose(molecularWeight(identity, "CH4"), 16.043);
  });

  test("unknown elements are reported with the species name", () => {
    assert.throws(
      () =>
        molecularWeight(
          { kind: "atomic-composition", elements: [{ element: "Xx", amount: 1 }] },
          "mystery"
        ),
      (error: unknown) => error instanceof MolecularWeightError && error.species === "mystery"
    );
  });

  test("unreadable SMILES becomes a MolecularWeightError", () => {
    assert.throws(
      () => molecularWeight({ kind: "SMILES", value: "C(C" }, "broken"),
      MolecularWeightError
    );
  });
});

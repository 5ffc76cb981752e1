/**
 * Tests for author name comparison.
 *
 * Run: node --import tsx --test src/validation/names.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { compareName } from "./names.js";

describe("compareName", () => {
  test("matches full names, initials and middle names", () => {
    const variants = [
      "Josiah Carberry",
      "J Carberry",
      "Josiah E. Carberry",
      "J. E. Carberry",
      "J E Carberry",
      "JE Carberry",
    ];
    for (const name of variants) {
      assert.equal(compareName("Josiah", "Carberry", name), true, name);
      assert.equal(compareName("J", "Carberry", name), true, name);
    }
  });

  test("matches hyphenated given names", () => {
    for (const name of ["Mei-Ling Tan", "M Tan", "M.-L. Tan", "M L Tan", "M-L Tan", "ML Tan"]) {
      assert.equal(compareName("Mei-Ling", "Tan", name), true, name);
    }
    assert.equal(compareName("M L", "Tan", "Mei-Ling Tan"), true);
    assert.equal(compareName("ML", "Tan", "Mei-Ling Tan"), true);
  });

  test("accepts family-name-first order", () => {
    assert.equal(compareName("Josiah", "Carberry", "Carberry, Josiah E"), true);
    assert.equal(compareName("Josiah", "Carberry", "Carberry, Josiah E."), true);
    assert.equal(compareName("Mei-Ling", "Tan", "Tan, M-L"), true);
  });

  test("compares middle initials when both sides give them", () => {
    assert.equal(compareName("Josiah E", "Carberry", "Josiah E Carberry"), true);
    assert.equal(compareName("Josiah E", "Carberry", "Josiah F Carberry"), false);
  });

  test("keeps hyphenated family names together", () => {
    assert.equal(compareName("Ana", "Lopez-Garcia", "A. Lopez-Garcia"), true);
    assert.equal(compareName("Ana", "Lopez-Garcia", "A. Garcia"), false);
  });

  test("rejects different people", () => {
    assert.equal(compareName("Josiah E", "Carberry", "Wrong Name"), false);
    assert.equal(compareName("Josiah", "Carberry", "Josiah Carbury"), false);
    assert.equal(compareName("Josiah", "Carberry", ""), false);
  });
});

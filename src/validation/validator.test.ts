/**
 * Tests for the document validator.
 *
 * Run: node --import tsx --test src/validation/validator.test.ts
 *
 * Tests cover:
 *   1. The two-point RCM document and idempotent re-validation
 *   2. Structural rules (identity exclusion, uncertainty groups, unknown keys)
 *   3. Semantic rules (dimensions, sums, gating, versions, checksums)
 *   4. Registry checks (ORCID names, DOI metadata, unavailability)
 *   5. Normalizer warnings
 */

import { strict as assert } from "node:assert";
import { readFileSync } from "node:fs";
import { describe, test } from "node:test";

import { parseChemKEDYaml } from "../document/index.js";
import { StaticRegistry, type BibliographicWork, type RegistryLookup } from "../lookup/index.js";
import type { ValidationIssue } from "./issues.js";
import { DocumentValidator } from "./validator.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

const CARBERRY_ORCID = "0000-0002-1825-0097";

const RCM_WORK: BibliographicWork = {
  doi: "10.1000/chemked.rcm.example",
  journal: "Example Journal of Combustion",
  year: 2017,
  volume: 12,
  pages: "100–110",
  authors: [
    { givenNames: "Josiah E", familyName: "Carberry", orcid: CARBERRY_ORCID },
    { givenNames: "Mary A", familyName: "Roe" },
  ],
};

function registry(): StaticRegistry {
  return new StaticRegistry({
    people: { [CARBERRY_ORCID]: { givenNames: "Josiah E", familyName: "Carberry" } },
    works: [RCM_WORK],
  });
}

function loadFixture(name: string): unknown {
  return parseChemKEDYaml(readFileSync(new URL(`../../fixtures/${name}`, import.meta.url), "utf-8"));
}

function point(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    temperature: ["1000 K"],
    pressure: ["1.0 atm"],
    "ignition-delay": ["100 us"],
    composition: {
      kind: "mole fraction",
      species: [
        { "species-name": "H2", InChI: "1S/H2/h1H", amount: [0.5] },
        { "species-name": "O2", InChI: "1S/O2/c1-2", amount: [0.5] },
      ],
    },
    "ignition-type": { target: "pressure", type: "d/dt max" },
    ...overrides,
  };
}

function doc(
  overrides: Record<string, unknown> = {},
  datapoints: unknown[] = [point()]
): Record<string, unknown> {
  return {
    "file-authors": [{ name: "Test Author" }],
    "file-version": 0,
    "chemked-version": "0.4.1",
    reference: { authors: [{ name: "Test Author" }], year: 2016 },
    "experiment-type": "ignition delay",
    apparatus: { kind: "shock tube" },
    datapoints,
    ...overrides,
  };
}

function findIssue(errors: ValidationIssue[], rule: string): ValidationIssue {
  const issue = errors.find((error) => error.rule === rule);
  assert.ok(issue, `expected a ${rule} issue, got ${JSON.stringify(errors)}`);
  return issue;
}

// ═══════════════════════════════════════════════════════════════════════════
// REFERENCE DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

describe("two-point RCM document", () => {
  test("validates with a matching registry", async () => {
    const result = await new DocumentValidator({ lookup: registry() }).validate(
      loadFixture("rcm-two-point.yaml")
    );
    assert.deepEqual(result.errors, []);
    assert.deepEqual(result.warnings, []);
    assert.equal(result.success, true);
    assert.equal(result.data?.datapoints.length, 2);
  });

  test("re-validating the same input gives the same result", async () => {
    const raw = loadFixture("rcm-two-point.yaml");
    const validator = new DocumentValidator({ lookup: registry() });
    const first = await validator.validate(raw);
    const second = await validator.validate(raw);
    assert.equal(first.success, true);
    assert.deepEqual(second, first);
  });

  test("looks each identifier up once per run", async () => {
    const lookup = registry();
    await new DocumentValidator({ lookup }).validate(loadFixture("rcm-two-point.yaml"));
    assert.deepEqual(lookup.requests, [CARBERRY_ORCID, "10.1000/chemked.rcm.example"]);
  });

  test("validates the shock tube document without a registry", async () => {
    const result = await new DocumentValidator().validate(loadFixture("shock-tube-single.yaml"));
    assert.deepEqual(result.errors, []);
    assert.equal(result.success, true);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STRUCTURAL RULES
// ═══════════════════════════════════════════════════════════════════════════

describe("structural rules", () => {
  test("a species with both InChI and SMILES fails", async () => {
    const species = [
      { "species-name": "H2", InChI: "1S/H2/h1H", SMILES: "[H][H]", amount: [0.5] },
      { "species-name": "O2", InChI: "1S/O2/c1-2", amount: [0.5] },
    ];
    const result = await new DocumentValidator().validate(
      doc({}, [point({ composition: { kind: "mole fraction", species } })])
    );
    assert.equal(result.success, false);
    const issue = findIssue(result.errors, "species_identity");
    assert.equal(issue.kind, "structural");
    assert.equal(issue.path, "datapoints.0.composition.species.0.SMILES");
  });

  test("a species without any identity fails", async () => {
    const species = [
      { "species-name": "H2", amount: [0.5] },
      { "species-name": "O2", InChI: "1S/O2/c1-2", amount: [0.5] },
    ];
    const result = await new DocumentValidator().validate(
      doc({}, [point({ composition: { kind: "mole fraction", species } })])
    );
    const issue = findIssue(result.errors, "species_identity");
    assert.equal(issue.message, "One of InChI, SMILES or atomic-composition is required");
  });

  test("uncertainty excludes upper and lower uncertainty", async () => {
    const temperature = [
      "1000 K",
      {
        "uncertainty-type": "absolute",
        uncertainty: "5 K",
        "upper-uncertainty": "5 K",
        "lower-uncertainty": "3 K",
      },
    ];
    const result = await new DocumentValidator().validate(doc({}, [point({ temperature })]));
    const issue = findIssue(result.errors, "exclusive_uncertainty");
    assert.equal(issue.kind, "structural");
    assert.equal(issue.path, "datapoints.0.temperature.1.uncertainty");
  });

  test("upper uncertainty requires lower uncertainty", async () => {
    const temperature = ["1000 K", { "uncertainty-type": "absolute", "upper-uncertainty": "5 K" }];
    const result = await new DocumentValidator().validate(doc({}, [point({ temperature })]));
    const issue = findIssue(result.errors, "uncertainty_dependency");
    assert.equal(issue.message, "upper-uncertainty requires lower-uncertainty");
    assert.equal(issue.path, "datapoints.0.temperature.1.upper-uncertainty");
  });

  test("collects every error in one run", async () => {
    const bad = point({ temperature: ["1000 ms"], colour: "blue" });
    delete bad.pressure;
    const result = await new DocumentValidator().validate(doc({}, [bad]));

    assert.equal(result.success, false);
    const byPath = new Map(result.errors.map((error) => [error.path, error]));
    assert.equal(byPath.get("datapoints.0.temperature")?.rule, "unit_dimension");
    assert.equal(byPath.get("datapoints.0.temperature")?.kind, "semantic");
    assert.equal(byPath.get("datapoints.0.pressure")?.message, "Required");
    assert.equal(byPath.get("datapoints.0.pressure")?.kind, "structural");
    assert.equal(byPath.get("datapoints.0")?.rule, "unrecognized_keys");
    assert.equal(result.errors.length, 3);
  });

  test("reports a missing top-level section", async () => {
    const raw = doc();
    delete raw.reference;
    const result = await new DocumentValidator().validate(raw);
    const issue = findIssue(result.errors, "invalid_type");
    assert.equal(issue.path, "reference");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SEMANTIC RULES
// ═══════════════════════════════════════════════════════════════════════════

describe("semantic rules", () => {
  test("absolute uncertainty must share the value's dimension", async () => {
    const temperature = ["1000 K", { "uncertainty-type": "absolute", uncertainty: "5 ms" }];
    const result = await new DocumentValidator().validate(doc({}, [point({ temperature })]));
    const issue = findIssue(result.errors, "uncertainty_dimension");
    assert.equal(issue.kind, "semantic");
    assert.equal(issue.path, "datapoints.0.temperature.1.uncertainty");
  });

  test("physical values must be positive", async () => {
    const result = await new DocumentValidator().validate(
      doc({}, [point({ pressure: ["-1.0 atm"] })])
    );
    const issue = findIssue(result.errors, "positive");
    assert.equal(issue.path, "datapoints.0.pressure");
  });

  test("temperatures below zero Celsius are positive in kelvin", async () => {
    const result = await new DocumentValidator().validate(
      doc({}, [point({ temperature: ["-20 degC"] }), point({ temperature: ["0 degC"] })])
    );
    assert.deepEqual(result.errors, []);
    assert.equal(result.success, true);
  });

  test("temperatures below absolute zero are rejected", async () => {
    const result = await new DocumentValidator().validate(
      doc({}, [point({ temperature: ["-300 degC"] })])
    );
    const issue = findIssue(result.errors, "positive");
    assert.equal(issue.path, "datapoints.0.temperature");
    assert.equal(issue.message, "Value must be greater than zero, got -300");
  });

  test("mole fractions must sum to one", async () => {
    const species = [
      { "species-name": "H2", InChI: "1S/H2/h1H", amount: [0.5] },
      { "species-name": "O2", InChI: "1S/O2/c1-2", amount: [0.4] },
    ];
    const result = await new DocumentValidator().validate(
      doc({}, [point({ composition: { kind: "mole fraction", species } })])
    );
    const issue = findIssue(result.errors, "composition_sum");
    assert.equal(issue.path, "datapoints.0.composition.species");
  });

  test("mole fractions above one are out of bounds", async () => {
    const species = [
      { "species-name": "H2", InChI: "1S/H2/h1H", amount: [1.5] },
      { "species-name": "O2", InChI: "1S/O2/c1-2", amount: [-0.5] },
    ];
    const result = await new DocumentValidator().validate(
      doc({}, [point({ composition: { kind: "mole fraction", species } })])
    );
    const bounds = result.errors.filter((error) => error.rule === "composition_bounds");
    assert.deepEqual(
      bounds.map((error) => error.path),
      ["datapoints.0.composition.species.0.amount", "datapoints.0.composition.species.1.amount"]
    );
  });

  test("rcm-data is rejected for shock tubes", async () => {
    const result = await new DocumentValidator().validate(
      doc({}, [point({ "rcm-data": { "compression-time": ["38.0 ms"] } })])
    );
    const issue = findIssue(result.errors, "apparatus_gating");
    assert.equal(issue.path, "datapoints.0.rcm-data");
  });

  test("pressure-rise is rejected for rapid compression machines", async () => {
    const result = await new DocumentValidator().validate(
      doc({ apparatus: { kind: "rapid compression machine" } }, [
        point({ "pressure-rise": ["0.1 1/ms"] }),
      ])
    );
    const issue = findIssue(result.errors, "apparatus_gating");
    assert.equal(issue.path, "datapoints.0.pressure-rise");
  });

  test("history columns must differ", async () => {
    const history = {
      type: "volume",
      time: { units: "s", column: 0 },
      quantity: { units: "cm3", column: 0 },
      values: [[0, 1]],
    };
    const result = await new DocumentValidator().validate(
      doc({ apparatus: { kind: "rapid compression machine" } }, [
        point({ "time-histories": [history] }),
      ])
    );
    const issue = findIssue(result.errors, "history_columns");
    assert.equal(issue.path, "datapoints.0.time-histories.0.quantity.column");
  });

  test("unknown enumeration values are semantic errors", async () => {
    const result = await new DocumentValidator().validate(doc({ apparatus: { kind: "flow reactor" } }));
    const issue = findIssue(result.errors, "enumeration");
    assert.equal(issue.kind, "semantic");
    assert.equal(issue.path, "apparatus.kind");
  });

  test("unsupported schema versions are rejected", async () => {
    const result = await new DocumentValidator().validate(doc({ "chemked-version": "0.3.0" }));
    const issue = findIssue(result.errors, "unsupported_version");
    assert.equal(issue.path, "chemked-version");
  });

  test("ORCID checksum failures are semantic errors", async () => {
    const result = await new DocumentValidator().validate(
      doc({ "file-authors": [{ name: "Test Author", ORCID: "0000-0000-0000-0000" }] })
    );
    const issue = findIssue(result.errors, "orcid_checksum");
    assert.equal(issue.kind, "semantic");
    assert.equal(issue.path, "file-authors.0.ORCID");
  });

  test("reference years in the future are rejected", async () => {
    const validator = new DocumentValidator({ maxYear: 2020 });
    const result = await validator.validate(
      doc({ reference: { authors: [{ name: "Test Author" }], year: 2021 } })
    );
    assert.equal(findIssue(result.errors, "year_range").message, "Year 2021 is later than 2020");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY CHECKS
// ═══════════════════════════════════════════════════════════════════════════

describe("registry checks", () => {
  const withAuthor = (name: string) => doc({ "file-authors": [{ name, ORCID: CARBERRY_ORCID }] });

  test("an author matching the registered name passes", async () => {
    const result = await new DocumentValidator({ lookup: registry() }).validate(
      withAuthor("Josiah E Carberry")
    );
    assert.deepEqual(result.errors, []);
    assert.equal(result.success, true);
  });

  test("a different name for the same ORCID fails", async () => {
    const result = await new DocumentValidator({ lookup: registry() }).validate(
      withAuthor("Wrong Name")
    );
    assert.equal(result.success, false);
    const issue = findIssue(result.errors, "orcid_name_mismatch");
    assert.equal(issue.kind, "semantic");
    assert.equal(issue.path, "file-authors.0.ORCID");
    assert.equal(
      issue.message,
      "Name and ORCID do not match. Name supplied: Wrong Name. Name associated with ORCID: Josiah E Carberry"
    );
  });

  test("an unregistered ORCID fails", async () => {
    const result = await new DocumentValidator({ lookup: new StaticRegistry() }).validate(
      withAuthor("Josiah E Carberry")
    );
    assert.equal(findIssue(result.errors, "orcid_not_found").path, "file-authors.0.ORCID");
  });

  test("an unreachable registry only warns", async () => {
    const lookup = new StaticRegistry({ unavailable: [CARBERRY_ORCID] });
    const result = await new DocumentValidator({ lookup }).validate(withAuthor("Wrong Name"));
    assert.equal(result.success, true);
    assert.deepEqual(result.warnings, [
      {
        code: "registry_unavailable",
        path: "file-authors.0.ORCID",
        message: `Could not check ORCID ${CARBERRY_ORCID}: registry unreachable`,
      },
    ]);
  });

  test("an ORCID record without a public name only warns", async () => {
    const lookup = new StaticRegistry({ people: { [CARBERRY_ORCID]: null } });
    const result = await new DocumentValidator({ lookup }).validate(withAuthor("Josiah Carberry"));
    assert.deepEqual(result.errors, []);
    assert.equal(result.success, true);
    assert.deepEqual(result.warnings, [
      {
        code: "orcid_name_unavailable",
        path: "file-authors.0.ORCID",
        message: `ORCID ${CARBERRY_ORCID} has no public name; could not check it against Josiah Carberry`,
      },
    ]);
  });

  test("a lookup that rejects is treated as unreachable", async () => {
    const lookup: RegistryLookup = {
      lookupOrcid: () => Promise.reject(new Error("lookup crashed")),
      lookupDoi: () => Promise.reject(new Error("lookup crashed")),
    };
    const result = await new DocumentValidator({ lookup }).validate(
      doc({
        "file-authors": [{ name: "Josiah E Carberry", ORCID: CARBERRY_ORCID }],
        reference: { doi: "10.1000/chemked.example", authors: [{ name: "Test Author" }], year: 2016 },
      })
    );
    assert.equal(result.success, true);
    assert.deepEqual(result.warnings, [
      {
        code: "registry_unavailable",
        path: "file-authors.0.ORCID",
        message: `Could not check ORCID ${CARBERRY_ORCID}: lookup crashed`,
      },
      {
        code: "registry_unavailable",
        path: "reference.doi",
        message: "Could not check DOI 10.1000/chemked.example: lookup crashed",
      },
    ]);
  });

  test("an unresolvable DOI fails after clean-up", async () => {
    const lookup = new StaticRegistry();
    const result = await new DocumentValidator({ lookup }).validate(
      doc({
        reference: { doi: "doi: 10.1000/missing.", authors: [{ name: "Test Author" }], year: 2016 },
      })
    );
    assert.equal(findIssue(result.errors, "doi_not_found").message, "DOI not found: 10.1000/missing");
    assert.deepEqual(lookup.requests, ["10.1000/missing"]);
  });

  test("reference metadata is compared with the registry", async () => {
    const raw = loadFixture("rcm-two-point.yaml");
    assert.ok(raw !== null && typeof raw === "object" && !Array.isArray(raw));
    const result = await new DocumentValidator({ lookup: registry() }).validate({
      ...raw,
      reference: {
        doi: "https://doi.org/10.1000/chemked.rcm.example",
        journal: "Another Journal",
        year: 2017,
        authors: [{ name: "Josiah E Carberry" }, { name: "Someone Else" }],
      },
    });

    const messages = result.errors.map((error) => error.message);
    assert.deepEqual(messages, [
      "journal should be Example Journal of Combustion",
      "Missing author: Mary A Roe",
      "Extra author(s) given: Someone Else",
    ]);
    assert.deepEqual(
      result.warnings.map((warning) => [warning.code, warning.path]),
      [["orcid_suggestion", "reference.authors.0"]]
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZER WARNINGS
// ═══════════════════════════════════════════════════════════════════════════

describe("normalizer warnings", () => {
  test("unused common properties and deprecated fields are reported", async () => {
    const raw = parseChemKEDYaml(`
file-authors:
  - name: Test Author
file-version: 0
chemked-version: 0.4.1
reference:
  authors:
    - name: Test Author
  year: 2016
experiment-type: ignition delay
apparatus:
  kind: rapid compression machine
common-properties:
  ignition-type: &ign
    target: pressure
    type: d/dt max
  pressure: &pres
    - 1.0 atm
datapoints:
  - temperature: [1000 K]
    pressure: [2.0 atm]
    ignition-delay: [10 ms]
    ignition-type: *ign
    composition:
      kind: mole fraction
      species:
        - species-name: Ar
          InChI: 1S/Ar
          amount: [1.0]
    volume-history:
      time:
        units: s
        column: 0
      volume:
        units: cm3
        column: 1
      values:
        - [0.0, 10.0]
        - [0.01, 9.0]
`);
    const result = await new DocumentValidator().validate(raw);
    assert.deepEqual(result.errors, []);
    assert.deepEqual(
      result.warnings.map((warning) => [warning.code, warning.path]),
      [
        ["unused_common_property", "common-properties.pressure"],
        ["deprecated_field", "datapoints.0.volume-history"],
      ]
    );
    assert.equal(result.data?.datapoints[0]?.timeHistories[0]?.type, "volume");
  });
});

/**
 * Tests for the typed record model.
 *
 * Run: node --import tsx --test src/record/record.test.ts
 *
 * Tests cover:
 *   1. Building records from the reference documents
 *   2. Composition strings and basis conversion
 *   3. Asymmetric uncertainty handling
 *   4. Immutability and the document round trip
 *   5. Tabular rows: column selection and species columns
 */

import { strict as assert } from "node:assert";
import { readFileSync } from "node:fs";
import { describe, test } from "node:test";
import { fileURLToPath } from "node:url";

import { Quantity } from "../units/index.js";
import { DocumentValidationError, DocumentValidator } from "../validation/index.js";
import { ChemKED } from "./chemked.js";
import { Composition, Species } from "./composition.js";
import { ASYMMETRIC_UNCERTAINTY_MESSAGE } from "./quantities.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));
}

function fixtureText(name: string): string {
  return readFileSync(fixturePath(name), "utf-8");
}

function assertClose(actual: number | undefined, expected: number, rtol = 1e-9): void {
  assert.ok(actual !== undefined, `expected a number close to ${expected}`);
  const tolerance = rtol * Math.max(Math.abs(actual), Math.abs(expected));
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${actual} to be close to ${expected}`);
}

const RCM_MOLE_STRING = "H2:0.125, O2:0.0625, N2:0.18125, Ar:0.63125";

// ═══════════════════════════════════════════════════════════════════════════
// REFERENCE DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

describe("ChemKED records", () => {
  test("builds the two-point RCM record", async () => {
    const record = await ChemKED.fromFile(fixturePath("rcm-two-point.yaml"));

    assert.equal(record.datapoints.length, 2);
    assert.equal(record.apparatus.kind, "rapid compression machine");
    assert.equal(record.reference.pages, "100-110");
    assert.deepEqual(record.fileAuthors, [{ name: "Josiah E Carberry", orcid: "0000-0002-1825-0097" }]);
    assert.deepEqual(record.warnings, []);

    const [first, second] = record.datapoints;
    assert.ok(first && second);
    assert.equal(first.temperature.magnitude, 297.4);
    assert.equal(first.temperature.units, "K");
    assertClose(first.pressure.to("Pa").magnitude, 958 * 133.322, 1e-5);
    assertClose(first.ignitionDelay.to("s").magnitude, 1.0e-3);
    assert.equal(first.equivalenceRatio, 1);
    assert.deepEqual(first.ignitionType, { target: "pressure", type: "d/dt max" });

    assert.equal(first.experiment.kind, "rapid compression machine");
    if (first.experiment.kind === "rapid compression machine") {
      assert.equal(first.experiment.compressionTime?.toString(), "38 ms");
      assert.equal(first.experiment.stroke, undefined);
    }
  });

  test("data points do not share composition objects", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [first, second] = record.datapoints;
    assert.ok(first && second);
    assert.notEqual(first.composition, second.composition);
    assert.equal(first.getMoleFractionString(), second.getMoleFractionString());
  });

  test("exposes the volume history of the first point only", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [first, second] = record.datapoints;
    assert.ok(first && second);

    const volume = first.volumeHistory;
    assert.ok(volume);
    assert.equal(volume.length, 3);
    assert.equal(volume.quantityUnits, "cm3");
    const times = volume.times("ms");
    assertClose(times[1], 1);
    assertClose(times[2], 2);
    assertClose(volume.quantities("m^3")[0], 5.47669375e-4);
    assert.equal(second.volumeHistory, undefined);
    assert.equal(second.timeHistory("pressure"), undefined);
  });

  test("builds the shock tube record with its pressure rise", async () => {
    const record = await ChemKED.fromYaml(fixtureText("shock-tube-single.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);

    assert.equal(point.experiment.kind, "shock tube");
    if (point.experiment.kind === "shock tube") {
      assert.equal(point.experiment.pressureRise?.units, "1/ms");
      assertClose(point.experiment.pressureRise?.to("1/s").magnitude, 100);
    }
    assertClose(point.ignitionDelay.to("s").magnitude, 471.54e-6);
    assert.equal(point.ignitionDelay.relativeUncertainty, 0.1);
  });

  test("rejects an invalid document with every issue", async () => {
    const text = fixtureText("shock-tube-single.yaml")
      .replace("chemked-version: 0.4.1", "chemked-version: 9.9.9")
      .replace("- 2.18 atm", "- 2.18 K");

    await assert.rejects(ChemKED.fromYaml(text), (err: unknown) => {
      assert.ok(err instanceof DocumentValidationError);
      assert.deepEqual(
        err.issues.map((issue) => issue.rule),
        ["unsupported_version", "unit_dimension"]
      );
      return true;
    });
  });

  test("skipValidation decodes without semantic rules", async () => {
    const text = fixtureText("shock-tube-single.yaml").replace(
      "chemked-version: 0.4.1",
      "chemked-version: 9.9.9"
    );
    const record = await ChemKED.fromYaml(text, { skipValidation: true });
    assert.equal(record.chemkedVersion, "9.9.9");
  });

  test("skipValidation still rejects structural problems", async () => {
    const text = fixtureText("shock-tube-single.yaml").replace("file-version: 1", "file-version: one");
    await assert.rejects(ChemKED.fromYaml(text, { skipValidation: true }), DocumentValidationError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// COMPOSITION
// ═══════════════════════════════════════════════════════════════════════════

describe("composition strings", () => {
  test("mole fraction string in document order", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);
    assert.equal(point.getMoleFractionString(), RCM_MOLE_STRING);
    assert.equal(point.getCompositionString("mole"), RCM_MOLE_STRING);
  });

  test("species conversion renames by name or InChI", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);
    assert.equal(
      point.getMoleFractionString({ H2: "h2", "1S/Ar": "AR" }),
      "h2:0.125, O2:0.0625, N2:0.18125, AR:0.63125"
    );
    assert.throws(
      () => point.getMoleFractionString({ CH4: "methane" }),
      (err: unknown) =>
        err instanceof RangeError && err.message === "Unrecognized species in species conversion: CH4"
    );
  });

  test("mass fractions use molecular weights", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);

    const weighted = [0.125 * 2.016, 0.0625 * 31.998, 0.18125 * 28.014, 0.63125 * 39.948];
    const total = weighted.reduce((sum, value) => sum + value, 0);
    const mass = point.composition.massFractions();
    weighted.forEach((value, i) => assertClose(mass[i], value / total));
    assert.ok(point.getMassFractionString().startsWith("H2:0.0"));
  });

  test("mass fraction input converts back to the same mole fractions", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);

    const mass = point.composition.massFractions();
    const species = point.composition.species.map(
      (entry, i) => new Species(entry.name, entry.identity, new Quantity(mass[i] ?? NaN))
    );
    const massComposition = new Composition("mass fraction", species);
    const moles = massComposition.moleFractions();
    [0.125, 0.0625, 0.18125, 0.63125].forEach((expected, i) => assertClose(moles[i], expected));
  });

  test("mole percent is divided by 100", async () => {
    const record = await ChemKED.fromYaml(fixtureText("shock-tube-single.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);
    const moles = point.composition.moleFractions();
    assertClose(moles[0], 0.00444);
    assertClose(moles[1], 0.00556);
    assertClose(moles[2], 0.99);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// UNCERTAINTY
// ═══════════════════════════════════════════════════════════════════════════

describe("asymmetric uncertainty", () => {
  test("collapses to the larger bound and records a warning", async () => {
    const record = await ChemKED.fromYaml(fixtureText("shock-tube-single.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);

    assert.equal(point.temperature.uncertainty?.kind, "absolute");
    assertClose(point.temperature.absoluteUncertainty, 5);
    assert.deepEqual(record.warnings, [
      {
        code: "asymmetric_uncertainty",
        path: "datapoints.0.temperature",
        message: ASYMMETRIC_UNCERTAINTY_MESSAGE,
      },
    ]);
  });

  test("bounds in different units are compared in the value's units", async () => {
    const text = fixtureText("shock-tube-single.yaml").replace(
      "lower-uncertainty: 3 K",
      "lower-uncertainty: 9 degC"
    );
    const record = await ChemKED.fromYaml(text);
    const [point] = record.datapoints;
    assert.ok(point);
    assertClose(point.temperature.absoluteUncertainty, 9);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TABULAR ROWS
// ═══════════════════════════════════════════════════════════════════════════

describe("toRows", () => {
  test("selects columns case-insensitively, in the order asked", async () => {
    const record = await ChemKED.fromFile(fixturePath("rcm-two-point.yaml"));
    const rows = record.toRows(["ignition delay", "TEMPERATURE", "Reference:Year"]);

    assert.equal(rows.length, 2);
    const [row] = rows;
    assert.ok(row);
    assert.deepEqual(Object.keys(row), ["Ignition Delay", "Temperature", "Reference:Year"]);
    assertClose(Number(row["Ignition Delay"]), 1.0e-3);
    assertClose(Number(row.Temperature), 297.4);
    assert.equal(row["Reference:Year"], 2017);
  });

  test("composition becomes one mole-fraction column per species", async () => {
    const record = await ChemKED.fromFile(fixturePath("rcm-two-point.yaml"));
    const [row] = record.toRows(["Composition"]);
    assert.deepEqual(row, { H2: 0.125, O2: 0.0625, N2: 0.18125, Ar: 0.63125 });
  });

  test("without a selection every column is included", async () => {
    const record = await ChemKED.fromFile(fixturePath("rcm-two-point.yaml"));
    const [row] = record.toRows();
    assert.ok(row);

    assert.deepEqual(Object.keys(row), [
      "Temperature",
      "Pressure",
      "Ignition Delay",
      "Equivalence Ratio",
      "H2",
      "O2",
      "N2",
      "Ar",
      "Reference:DOI",
      "Reference:Journal",
      "Reference:Year",
      "Reference:Volume",
      "Reference:Pages",
      "Reference:Detail",
      "Reference:Authors",
      "Apparatus:Kind",
      "Apparatus:Institution",
      "Apparatus:Facility",
      "Experiment Type",
      "File Author",
      "File Version",
      "ChemKED Version",
    ]);
    assertClose(Number(row.Pressure), 958 * 133.322, 1e-5);
    assert.equal(row["Equivalence Ratio"], 1);
    assert.equal(row["Reference:DOI"], "10.1000/chemked.rcm.example");
    assert.equal(row["Reference:Authors"], "Josiah E Carberry");
    assert.equal(row["Reference:Pages"], "100-110");
    assert.equal(row["Apparatus:Kind"], "rapid compression machine");
    assert.equal(row["Apparatus:Facility"], "Example RCM");
    assert.equal(row["Experiment Type"], "ignition delay");
    assert.equal(row["File Author"], "Josiah E Carberry");
    assert.equal(row["File Version"], 0);
    assert.equal(row["ChemKED Version"], "0.4.1");
  });

  test("absent optional values are null", async () => {
    const record = await ChemKED.fromFile(fixturePath("shock-tube-single.yaml"));
    const [row] = record.toRows(["Equivalence Ratio", "Apparatus", "Reference:Journal"]);
    assert.deepEqual(row, {
      "Equivalence Ratio": 0.5,
      "Apparatus:Kind": "shock tube",
      "Apparatus:Institution": "Example University",
      "Apparatus:Facility": null,
      "Reference:Journal": null,
    });
  });

  test("an unknown column is rejected", async () => {
    const record = await ChemKED.fromFile(fixturePath("rcm-two-point.yaml"));
    assert.throws(() => record.toRows(["Temperature", "Colour"]), {
      name: "RangeError",
      message: "Colour is not a valid output column choice",
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// IMMUTABILITY AND ROUND TRIP
// ═══════════════════════════════════════════════════════════════════════════

describe("immutability", () => {
  test("records cannot be modified in place", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const [point] = record.datapoints;
    assert.ok(point);

    assert.ok(Object.isFrozen(record));
    assert.ok(Object.isFrozen(record.datapoints));
    assert.ok(Object.isFrozen(point.composition.species));
    assert.equal(Reflect.set(record, "fileVersion", 3), false);
    assert.equal(Reflect.set(point.temperature, "magnitude", 0), false);
    assert.equal(record.fileVersion, 0);
  });

  test("withFileVersion returns a new record", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const bumped = record.withFileVersion(1);
    assert.equal(bumped.fileVersion, 1);
    assert.equal(record.fileVersion, 0);
    assert.equal(bumped.datapoints.length, 2);
    assert.throws(() => record.withFileVersion(-1), RangeError);
  });

  test("toDocument re-validates", async () => {
    const validator = new DocumentValidator();
    for (const name of ["rcm-two-point.yaml", "shock-tube-single.yaml"]) {
      const record = await ChemKED.fromYaml(fixtureText(name));
      const result = await validator.validate(record.toDocument());
      assert.deepEqual(result.errors, [], name);
      assert.equal(result.success, true);
    }
  });

  test("the round-tripped record keeps values and compositions", async () => {
    const record = await ChemKED.fromYaml(fixtureText("rcm-two-point.yaml"));
    const again = await ChemKED.fromYaml(record.toYaml());

    assert.equal(again.datapoints.length, 2);
    const [point] = again.datapoints;
    assert.ok(point);
    assert.equal(point.temperature.toString(), "297.4 K");
    assert.equal(point.pressure.toString(), "958 torr");
    assert.equal(point.getMoleFractionString(), RCM_MOLE_STRING);
    assert.equal(point.volumeHistory?.length, 3);
  });

  test("a collapsed uncertainty is written back as symmetric", async () => {
    const record = await ChemKED.fromYaml(fixtureText("shock-tube-single.yaml"));
    const document = record.toDocument();
    const again = await ChemKED.fromDocument(document);
    assert.deepEqual(again.warnings, []);
    assertClose(again.datapoints[0]?.temperature.absoluteUncertainty, 5);
  });
});

/**
 * Tests for YAML loading and common-properties normalization.
 *
 * Run: node --import tsx --test src/document/normalizer.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { DocumentParseError } from "./errors.js";
import { parseChemKEDYaml } from "./loader.js";
import { normalizeDocument } from "./normalizer.js";
import { deepCopy, isMapping } from "./raw.js";

const SHARED_YAML = [
  "common-properties:",
  "  pressure: &pres",
  "    - 1.0 atm",
  "  ignition-type: &ign",
  "    target: OH*",
  "    type: max",
  "  unused: &unused",
  "    - 5 K",
  "datapoints:",
  "  - pressure: *pres",
  "    ignition-type: *ign",
  "  - pressure: *pres",
  "  - temperature: [1000 K]",
  "",
].join("\n");

function datapoints(document: unknown): unknown[] {
  assert.ok(isMapping(document));
  const points = document.datapoints;
  assert.ok(Array.isArray(points));
  return points;
}

function field(point: unknown, key: string): unknown {
  assert.ok(isMapping(point));
  return point[key];
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

describe("parseChemKEDYaml", () => {
  test("resolves aliases to the same node", () => {
    const [first, second] = datapoints(parseChemKEDYaml(SHARED_YAML));
    assert.equal(field(first, "pressure"), field(second, "pressure"));
  });

  test("rejects CRLF line endings", () => {
    assert.throws(
      () => parseChemKEDYaml("file-version: 0\r\nchemked-version: 0.4.1\r\n"),
      (err: unknown) =>
        err instanceof DocumentParseError && err.issues[0]?.rule === "line_endings"
    );
  });

  test("rejects custom tags", () => {
    assert.throws(
      () => parseChemKEDYaml("datapoints: !include datapoints.yaml\n"),
      (err: unknown) => err instanceof DocumentParseError && err.issues[0]?.rule === "custom_tag"
    );
  });

  test("reports syntax errors with a line number", () => {
    assert.throws(
      () => parseChemKEDYaml("a: 1\nb: [1, 2\n"),
      (err: unknown) =>
        err instanceof DocumentParseError &&
        err.issues[0]?.rule === "yaml_syntax" &&
        /^line \d+$/.test(err.issues[0].path)
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

describe("normalizeDocument", () => {
  test("drops common-properties", () => {
    const { document } = normalizeDocument(parseChemKEDYaml(SHARED_YAML));
    assert.ok(isMapping(document));
    assert.deepEqual(Object.keys(document), ["datapoints"]);
  });

  test("data points no longer share nodes", () => {
    const { document } = normalizeDocument(parseChemKEDYaml(SHARED_YAML));
    const [first, second] = datapoints(document);
    const pressure = field(first, "pressure");
    assert.deepEqual(pressure, ["1.0 atm"]);
    assert.deepEqual(field(second, "pressure"), ["1.0 atm"]);
    assert.notEqual(pressure, field(second, "pressure"));
  });

  test("does not inject common properties into points that omit them", () => {
    const { document } = normalizeDocument(parseChemKEDYaml(SHARED_YAML));
    const [, second, third] = datapoints(document);
    assert.equal(field(second, "ignition-type"), undefined);
    assert.equal(field(third, "pressure"), undefined);
  });

  test("warns about unreferenced common properties", () => {
    const { warnings } = normalizeDocument(parseChemKEDYaml(SHARED_YAML));
    assert.deepEqual(warnings, [
      {
        code: "unused_common_property",
        path: "common-properties.unused",
        message: 'Common property "unused" is not referenced by any data point',
      },
    ]);
  });

  test("a scalar common property counts as used when a point repeats it", () => {
    const raw = {
      "common-properties": { "equivalence-ratio": 0.5, "file-note": "x" },
      datapoints: [{ "equivalence-ratio": 0.5 }],
    };
    const { warnings } = normalizeDocument(raw);
    assert.deepEqual(
      warnings.map((warning) => warning.path),
      ["common-properties.file-note"]
    );
  });

  test("never mutates its input", () => {
    const raw = parseChemKEDYaml(SHARED_YAML);
    const before = JSON.stringify(raw);
    const first = normalizeDocument(raw);
    const second = normalizeDocument(raw);

    assert.equal(JSON.stringify(raw), before);
    assert.ok(isMapping(raw) && isMapping(raw["common-properties"]));
    assert.deepEqual(first, second);
    assert.notEqual(datapoints(first.document)[0], datapoints(raw)[0]);
  });

  test("non-mapping documents are copied through", () => {
    const raw = [{ a: 1 }];
    const { document, warnings } = normalizeDocument(raw);
    assert.deepEqual(document, raw);
    assert.notEqual(document, raw);
    assert.deepEqual(warnings, []);
  });
});

describe("deepCopy", () => {
  test("rejects recursive structures", () => {
    const node: Record<string, unknown> = { name: "loop" };
    node.self = node;
    assert.throws(
      () => deepCopy({ datapoints: [node] }),
      (err: unknown) =>
        err instanceof DocumentParseError && err.issues[0]?.rule === "recursive_alias"
    );
  });

  test("copies dates", () => {
    const date = new Date(Date.UTC(2017, 0, 1));
    const copy = deepCopy({ when: date });
    assert.ok(isMapping(copy));
    const when = copy.when;
    assert.ok(when instanceof Date);
    assert.notEqual(when, date);
    assert.equal(when.getTime(), date.getTime());
  });
});

/**
 * YAML loading for ChemKED documents.
 *
 * Anchors and aliases are resolved by js-yaml; the aliased nodes stay shared
 * until {@link normalizeDocument} copies them apart. Data documents must use
 * UNIX line endings and must not carry custom tags (the schema's `!include`
 * directive is only meaningful when the schema itself is assembled).
 */

import { readFileSync } from "node:fs";
import { load, YAMLException } from "js-yaml";

import { DocumentParseError } from "./errors.js";

export function parseChemKEDYaml(text: string): unknown {
  if (text.includes("\r")) {
    throw new DocumentParseError("Document must use UNIX line endings", [
      {
        path: "(root)",
        message: "CRLF or CR line endings found; convert the file to LF line endings",
        kind: "structural",
        rule: "line_endings",
      },
    ]);
  }

  try {
    return load(text);
  } catch (err) {
    if (err instanceof YAMLException) {
      const customTag = /unknown tag/.test(err.reason);
      throw new DocumentParseError(`Cannot parse ChemKED YAML: ${err.reason}`, [
        {
          path: err.mark ? `line ${err.mark.line + 1}` : "(root)",
          message: customTag
            ? `Custom tags are not allowed in data documents (${err.reason})`
            : err.reason,
          kind: "structural",
          rule: customTag ? "custom_tag" : "yaml_syntax",
        },
      ]);
    }
    throw err;
  }
}

export function readChemKEDFile(path: string): unknown {
  return parseChemKEDYaml(readFileSync(path, "utf-8"));
}

/**
 * YAML serialization of plain ChemKED documents.
 */

import { dump } from "js-yaml";

/**
 * Serialize a document mapping. Objects shared between data points are
 * written once as anchors and referenced with aliases.
 */
export function toChemKEDYaml(document: unknown): string {
  return dump(document, { lineWidth: -1, noCompatMode: true, sortKeys: false });
}

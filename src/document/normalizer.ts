/**
 * ═══════════════════════════════════════════════════════════════════════════
 * COMMON-PROPERTIES NORMALIZATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Authors declare shared sub-structures once under `common-properties` with
 * YAML anchors and refer to them from each data point with aliases:
 *
 *   common-properties:
 *     composition: &comp
 *       kind: mole fraction
 *       species: [...]
 *   datapoints:
 *     - composition: *comp
 *
 * After parsing, every alias is the SAME object. Normalization:
 *
 *   1. drops `common-properties` from the document,
 *   2. deep-copies every data point so no two points (and not the input)
 *      share a node,
 *   3. injects nothing: a data point that does not reference a common field
 *      does not get it,
 *   4. reports common keys that no data point references.
 *
 * The input is never mutated, so normalizing (and validating) the same raw
 * document twice gives the same result.
 */

import { joinPath, type LookupWarning } from "../validation/issues.js";
import { collectNodes, deepCopy, isMapping, type RawMapping } from "./raw.js";

export const COMMON_PROPERTIES_KEY = "common-properties";

export interface NormalizedDocument {
  /** Independent copy of the input without `common-properties` */
  document: unknown;
  warnings: LookupWarning[];
}

function isReferenced(
  key: string,
  value: unknown,
  datapoints: readonly unknown[],
  nodes: ReadonlySet<object>
): boolean {
  if (typeof value === "object" && value !== null) {
    return nodes.has(value);
  }
  // Scalars carry no identity; an equal value under the same key counts
  return datapoints.some((point) => isMapping(point) && point[key] === value);
}

function findUnusedCommonProperties(source: RawMapping): LookupWarning[] {
  const common = source[COMMON_PROPERTIES_KEY];
  if (!isMapping(common)) return [];
  const datapoints = Array.isArray(source.datapoints) ? source.datapoints : [];

  const nodes = new Set<object>();
  for (const point of datapoints) collectNodes(point, nodes);

  const warnings: LookupWarning[] = [];
  for (const [key, value] of Object.entries(common)) {
    if (!isReferenced(key, value, datapoints, nodes)) {
      warnings.push({
        code: "unused_common_property",
        path: joinPath([COMMON_PROPERTIES_KEY, key]),
        message: `Common property "${key}" is not referenced by any data point`,
      });
    }
  }
  return warnings;
}

export function normalizeDocument(raw: unknown): NormalizedDocument {
  if (!isMapping(raw)) {
    return { document: deepCopy(raw), warnings: [] };
  }

  const warnings = findUnusedCommonProperties(raw);
  const document: RawMapping = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === COMMON_PROPERTIES_KEY) continue;
    document[key] = deepCopy(value);
  }
  return { document, warnings };
}

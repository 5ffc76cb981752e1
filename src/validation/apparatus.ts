/**
 * Fields that only make sense for one kind of apparatus.
 *
 * Runs on the normalized raw document rather than through the schema, so
 * gating errors are reported even when other parts of a data point are
 * malformed.
 */

import { isMapping } from "../document/index.js";
import { joinPath, type ValidationIssue } from "./issues.js";

const RCM = "rapid compression machine";
const SHOCK_TUBE = "shock tube";

function gatingIssue(path: Array<string | number>, message: string): ValidationIssue {
  return { path: joinPath(path), message, kind: "semantic", rule: "apparatus_gating" };
}

function hasVolumeHistory(point: Record<string, unknown>): boolean {
  const histories = point["time-histories"];
  return (
    Array.isArray(histories) &&
    histories.some((history) => isMapping(history) && history.type === "volume")
  );
}

export function checkApparatusGating(document: unknown): ValidationIssue[] {
  if (!isMapping(document) || !isMapping(document.apparatus)) return [];
  const kind = document.apparatus.kind;
  const datapoints = Array.isArray(document.datapoints) ? document.datapoints : [];

  const issues: ValidationIssue[] = [];
  datapoints.forEach((point, index) => {
    if (!isMapping(point)) return;
    if (kind === SHOCK_TUBE) {
      if (point["rcm-data"] !== undefined) {
        issues.push(
          gatingIssue(
            ["datapoints", index, "rcm-data"],
            "rcm-data is only allowed for rapid compression machine experiments"
          )
        );
      }
      if (point["volume-history"] !== undefined || hasVolumeHistory(point)) {
        const key = point["volume-history"] !== undefined ? "volume-history" : "time-histories";
        issues.push(
          gatingIssue(
            ["datapoints", index, key],
            "Volume histories are only allowed for rapid compression machine experiments"
          )
        );
      }
    } else if (kind === RCM && point["pressure-rise"] !== undefined) {
      issues.push(
        gatingIssue(
          ["datapoints", index, "pressure-rise"],
          "pressure-rise is only allowed for shock tube experiments"
        )
      );
    }
  });
  return issues;
}

/**
 * Deprecation notices for ChemKED 0.3 fields that are still accepted.
 */
export function findDeprecatedFields(document: unknown): Array<{ path: string; message: string }> {
  if (!isMapping(document) || !Array.isArray(document.datapoints)) return [];
  const found: Array<{ path: string; message: string }> = [];
  document.datapoints.forEach((point, index) => {
    if (isMapping(point) && point["volume-history"] !== undefined) {
      found.push({
        path: joinPath(["datapoints", index, "volume-history"]),
        message: "volume-history is deprecated; use a time-histories entry of type volume",
      });
    }
  });
  return found;
}

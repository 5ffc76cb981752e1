/**
 * Fixed vocabulary tables between ReSpecTh and ChemKED.
 *
 * Every table is bijective: each internal value has exactly one external
 * spelling and back. Lookups that miss raise UnmappedVocabularyError.
 */

import type { ApparatusKind, IgnitionTarget, IgnitionType } from "../schema/index.js";
import type { PhysicalKind } from "../units/index.js";
import { UnmappedVocabularyError } from "./errors.js";

export const RESPECTH_IGNITION_TARGETS = {
  pressure: "P",
  temperature: "T",
  OH: "OH",
  "OH*": "OHEX",
  CH: "CH",
  "CH*": "CHEX",
} as const satisfies Record<IgnitionTarget, string>;

export const RESPECTH_IGNITION_TYPES = {
  "d/dt max": "d/dt max",
  max: "max",
  "1/2 max": "1/2 max",
  min: "min",
  "d/dt max extrapolated": "baseline max intercept from d/dt",
} as const satisfies Record<IgnitionType, string>;

export const RESPECTH_APPARATUS_KINDS = {
  "shock tube": "shock tube",
  "rapid compression machine": "rapid compression machine",
} as const satisfies Record<ApparatusKind, string>;

export const IGNITION_DELAY_EXPERIMENT = "Ignition delay measurement";

function invert<K extends string, V extends string>(table: Record<K, V>, vocabulary: string): Map<V, K> {
  const inverse = new Map<V, K>();
  for (const key of Object.keys(table)) {
    if (!isKeyOf(table, key)) continue;
    const value = table[key];
    if (inverse.has(value)) {
      throw new Error(`${vocabulary} table maps "${value}" twice`);
    }
    inverse.set(value, key);
  }
  return inverse;
}

function isKeyOf<K extends string>(table: Record<K, unknown>, key: string): key is K {
  return Object.hasOwn(table, key);
}

const TARGETS_FROM_EXTERNAL = invert<IgnitionTarget, string>(RESPECTH_IGNITION_TARGETS, "ignition target");
const TYPES_FROM_EXTERNAL = invert<IgnitionType, string>(RESPECTH_IGNITION_TYPES, "ignition type");
const APPARATUS_FROM_EXTERNAL = invert<ApparatusKind, string>(RESPECTH_APPARATUS_KINDS, "apparatus kind");

/** `P;` and `p` both read as `pressure`. */
export function ignitionTargetFromReSpecTh(target: string): IgnitionTarget {
  const key = target.trim().replace(/;$/, "").toUpperCase();
  const mapped = TARGETS_FROM_EXTERNAL.get(key);
  if (mapped === undefined) throw new UnmappedVocabularyError("ignition target", target);
  return mapped;
}

export function ignitionTargetToReSpecTh(target: IgnitionTarget): string {
  return RESPECTH_IGNITION_TARGETS[target];
}

export function ignitionTypeFromReSpecTh(type: string): IgnitionType {
  const mapped = TYPES_FROM_EXTERNAL.get(type.trim());
  if (mapped === undefined) throw new UnmappedVocabularyError("ignition type", type);
  return mapped;
}

export function ignitionTypeToReSpecTh(type: IgnitionType): string {
  return RESPECTH_IGNITION_TYPES[type];
}

export function apparatusKindFromReSpecTh(kind: string): ApparatusKind {
  const mapped = APPARATUS_FROM_EXTERNAL.get(kind.trim());
  if (mapped === undefined) throw new UnmappedVocabularyError("apparatus kind", kind);
  return mapped;
}

/** ReSpecTh property names carrying a value with units. */
export const RESPECTH_VALUE_PROPERTIES = {
  temperature: { field: "temperature", kind: "temperature" },
  pressure: { field: "pressure", kind: "pressure" },
  "ignition delay": { field: "ignition-delay", kind: "time" },
  "pressure rise": { field: "pressure-rise", kind: "pressure-rise" },
} as const satisfies Record<string, { field: string; kind: PhysicalKind }>;

export type ReSpecThValueProperty = keyof typeof RESPECTH_VALUE_PROPERTIES;
export type ValueField = (typeof RESPECTH_VALUE_PROPERTIES)[ReSpecThValueProperty]["field"];

export function isValueProperty(name: string): name is ReSpecThValueProperty {
  return Object.hasOwn(RESPECTH_VALUE_PROPERTIES, name);
}

export const EQUIVALENCE_RATIO_PROPERTY = "equivalence ratio";
export const INITIAL_COMPOSITION_PROPERTY = "initial composition";
export const COMPOSITION_PROPERTY = "composition";
export const UNCERTAINTY_PROPERTY = "uncertainty";
export const UNITLESS = "unitless";

/** Time-history quantities a ReSpecTh dataGroup can carry. */
export const RESPECTH_HISTORY_TYPES = ["volume", "temperature", "pressure"] as const;
export type ReSpecThHistoryType = (typeof RESPECTH_HISTORY_TYPES)[number];

export function isReSpecThHistoryType(type: string): type is ReSpecThHistoryType {
  return RESPECTH_HISTORY_TYPES.some((candidate) => candidate === type);
}

/** ReSpecTh files spell torr with a capital letter. */
export function unitsFromReSpecTh(units: string): string {
  return units.trim() === "Torr" ? "torr" : units.trim();
}

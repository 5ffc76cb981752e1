/**
 * Helpers for loosely-typed documents straight out of a parser.
 */

import { DocumentParseError } from "./errors.js";

export type RawMapping = Record<string, unknown>;

export function isMapping(value: unknown): value is RawMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy a parsed document without preserving any sharing: two references to
 * one anchored node become two independent trees.
 */
export function deepCopy(value: unknown, ancestors: unknown[] = []): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (ancestors.includes(value)) {
    throw new DocumentParseError("Recursive alias in document", [
      {
        path: "(root)",
        message: "An alias refers to one of its own ancestors",
        kind: "structural",
        rule: "recursive_alias",
      },
    ]);
  }
  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.map((item) => deepCopy(item, path));
  }
  const copy: RawMapping = {};
  for (const [key, item] of Object.entries(value)) {
    copy[key] = deepCopy(item, path);
  }
  return copy;
}

/**
 * Every object node reachable from `value`, including `value` itself.
 */
export function collectNodes(value: unknown, into: Set<object> = new Set()): Set<object> {
  if (typeof value !== "object" || value === null || into.has(value)) {
    return into;
  }
  into.add(value);
  const children = Array.isArray(value) ? value : Object.values(value);
  for (const child of children) {
    collectNodes(child, into);
  }
  return into;
}

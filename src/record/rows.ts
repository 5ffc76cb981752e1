/**
 * Tabular export: one plain row per data point.
 *
 * Column names are matched case-insensitively. Three names expand:
 *
 *   Composition  → one column per species, holding its mole fraction
 *   Reference    → every Reference:* column
 *   Apparatus    → every Apparatus:* column
 *
 * Physical values are given in their reference units (K, Pa, s).
 */

import { REFERENCE_UNITS } from "../units/index.js";
import type { ChemKED } from "./chemked.js";
import type { DataPoint } from "./datapoint.js";

export type RowValue = string | number | null;
export type DataRow = Record<string, RowValue>;

export const REFERENCE_COLUMNS = [
  "Reference:DOI",
  "Reference:Journal",
  "Reference:Year",
  "Reference:Volume",
  "Reference:Pages",
  "Reference:Detail",
  "Reference:Authors",
] as const;

export const APPARATUS_COLUMNS = ["Apparatus:Kind", "Apparatus:Institution", "Apparatus:Facility"] as const;

const POINT_COLUMNS = ["Temperature", "Pressure", "Ignition Delay", "Equivalence Ratio"] as const;
const RECORD_COLUMNS = ["Experiment Type", "File Author", "File Version", "ChemKED Version"] as const;

/** Columns `toRows()` accepts, in default order */
export const ROW_COLUMNS = [
  ...POINT_COLUMNS,
  "Composition",
  "Reference",
  ...REFERENCE_COLUMNS,
  "Apparatus",
  ...APPARATUS_COLUMNS,
  ...RECORD_COLUMNS,
] as const;

export type RowColumn = (typeof ROW_COLUMNS)[number];

type FixedColumn =
  | (typeof POINT_COLUMNS)[number]
  | (typeof REFERENCE_COLUMNS)[number]
  | (typeof APPARATUS_COLUMNS)[number]
  | (typeof RECORD_COLUMNS)[number];

type Column = { type: "fixed"; name: FixedColumn } | { type: "species"; name: string };

const DEFAULT_COLUMNS: readonly RowColumn[] = [
  ...POINT_COLUMNS,
  "Composition",
  "Reference",
  "Apparatus",
  ...RECORD_COLUMNS,
];

function canonicalColumn(requested: string): RowColumn {
  const key = requested.trim().toLowerCase();
  const match = ROW_COLUMNS.find((column) => column.toLowerCase() === key);
  if (!match) {
    throw new RangeError(`${requested} is not a valid output column choice`);
  }
  return match;
}

/** Species names across all data points, in order of first appearance */
function speciesNames(record: ChemKED): string[] {
  const names = new Set<string>();
  for (const point of record.datapoints) {
    for (const species of point.composition.species) names.add(species.name);
  }
  return [...names];
}

function expandColumns(record: ChemKED, requested: readonly string[]): Column[] {
  const chosen = requested.length === 0 ? DEFAULT_COLUMNS : requested.map(canonicalColumn);
  const columns: Column[] = [];
  for (const column of chosen) {
    switch (column) {
      case "Composition":
        columns.push(...speciesNames(record).map((name): Column => ({ type: "species", name })));
        break;
      case "Reference":
        columns.push(...REFERENCE_COLUMNS.map((name): Column => ({ type: "fixed", name })));
        break;
      case "Apparatus":
        columns.push(...APPARATUS_COLUMNS.map((name): Column => ({ type: "fixed", name })));
        break;
      default:
        columns.push({ type: "fixed", name: column });
    }
  }
  return columns;
}

function moleFraction(point: DataPoint, name: string): RowValue {
  const fractions = point.composition.moleFractions();
  const index = point.composition.species.findIndex((species) => species.name === name);
  return index < 0 ? null : (fractions[index] ?? null);
}

function fixedValue(record: ChemKED, point: DataPoint, column: FixedColumn): RowValue {
  const { reference, apparatus } = record;
  switch (column) {
    case "Temperature":
      return point.temperature.magnitudeIn(REFERENCE_UNITS.temperature);
    case "Pressure":
      return point.pressure.magnitudeIn(REFERENCE_UNITS.pressure);
    case "Ignition Delay":
      return point.ignitionDelay.magnitudeIn(REFERENCE_UNITS.time);
    case "Equivalence Ratio":
      return point.equivalenceRatio ?? null;
    case "Reference:DOI":
      return reference.doi ?? null;
    case "Reference:Journal":
      return reference.journal ?? null;
    case "Reference:Year":
      return reference.year;
    case "Reference:Volume":
      return reference.volume ?? null;
    case "Reference:Pages":
      return reference.pages ?? null;
    case "Reference:Detail":
      return reference.detail ?? null;
    // The author list can be long; the first author stands for it
    case "Reference:Authors":
      return reference.authors[0]?.name ?? null;
    case "Apparatus:Kind":
      return apparatus.kind;
    case "Apparatus:Institution":
      return apparatus.institution ?? null;
    case "Apparatus:Facility":
      return apparatus.facility ?? null;
    case "Experiment Type":
      return record.experimentType;
    case "File Author":
      return record.fileAuthors[0]?.name ?? null;
    case "File Version":
      return record.fileVersion;
    case "ChemKED Version":
      return record.chemkedVersion;
  }
}

/**
 * @throws RangeError for a column name that is not recognized
 */
export function recordRows(record: ChemKED, requested: readonly string[] = []): DataRow[] {
  const columns = expandColumns(record, requested);
  return record.datapoints.map((point) => {
    const row: DataRow = {};
    for (const column of columns) {
      row[column.name] =
        column.type === "species" ? moleFraction(point, column.name) : fixedValue(record, point, column.name);
    }
    return row;
  });
}

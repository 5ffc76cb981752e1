/**
 * One ignition-delay measurement.
 *
 * Apparatus-specific fields (`rcm-data`, `pressure-rise`, volume histories)
 * are decoded here regardless of apparatus; gating them on
 * `apparatus.kind` is a document-level check.
 */

import { z } from "zod";

import { hasKind, isKnownUnits, REFERENCE_UNITS, type PhysicalKind } from "../units/index.js";
import { reportSemantic, ScalarSchema, type SchemaOptions } from "./context.js";
import { compositionSchema, type CompositionData } from "./composition.js";
import {
  HISTORY_QUANTITY_KINDS,
  HistoryTypeSchema,
  IgnitionTargetSchema,
  IgnitionTypeSchema,
  UncertaintyTypeSchema,
  type HistoryType,
  type IgnitionTarget,
  type IgnitionType,
} from "./enums.js";
import { valueField, type ValueNode } from "./values.js";

export interface IgnitionDefinition {
  readonly target: IgnitionTarget;
  readonly type: IgnitionType;
}

export const IgnitionDefinitionSchema = z
  .object({
    target: IgnitionTargetSchema,
    type: IgnitionTypeSchema,
  })
  .strict();

export interface RcmData {
  readonly compressedPressure?: ValueNode;
  readonly compressedTemperature?: ValueNode;
  readonly compressionTime?: ValueNode;
  readonly stroke?: ValueNode;
  readonly clearance?: ValueNode;
  readonly compressionRatio?: ValueNode;
}

/** Document key for each RCM field. */
export const RCM_DATA_KEYS = {
  compressedPressure: "compressed-pressure",
  compressedTemperature: "compressed-temperature",
  compressionTime: "compression-time",
  stroke: "stroke",
  clearance: "clearance",
  compressionRatio: "compression-ratio",
} as const satisfies Record<keyof RcmData, string>;

function rcmDataSchema(options: SchemaOptions) {
  return z
    .object({
      "compressed-pressure": valueField(options, { kind: "pressure", positive: true }).optional(),
      "compressed-temperature": valueField(options, { kind: "temperature", positive: true }).optional(),
      "compression-time": valueField(options, { kind: "time", positive: true }).optional(),
      stroke: valueField(options, { kind: "length", positive: true }).optional(),
      clearance: valueField(options, { kind: "length", positive: true }).optional(),
      "compression-ratio": valueField(options, { kind: "dimensionless", positive: true }).optional(),
    })
    .strict()
    .transform(
      (raw): RcmData => ({
        ...(raw["compressed-pressure"] && { compressedPressure: raw["compressed-pressure"] }),
        ...(raw["compressed-temperature"] && {
          compressedTemperature: raw["compressed-temperature"],
        }),
        ...(raw["compression-time"] && { compressionTime: raw["compression-time"] }),
        ...(raw.stroke && { stroke: raw.stroke }),
        ...(raw.clearance && { clearance: raw.clearance }),
        ...(raw["compression-ratio"] && { compressionRatio: raw["compression-ratio"] }),
      })
    );
}

export interface HistoryColumn {
  readonly units: string;
  readonly column: number;
}

export interface HistoryUncertainty {
  readonly type: "absolute" | "relative";
  readonly value: number;
  readonly units?: string;
}

export interface HistoryData {
  readonly type: HistoryType;
  readonly time: HistoryColumn;
  readonly quantity: HistoryColumn;
  readonly values: ReadonlyArray<readonly [number, number]>;
  readonly uncertainty?: HistoryUncertainty;
}

const ColumnSchema = z
  .object({
    units: z.string().min(1),
    column: z.number().int().min(0).max(1),
  })
  .strict();

const ValuesSchema = z
  .array(z.array(z.number()).length(2))
  .nonempty()
  .transform((rows) => rows.map((row): readonly [number, number] => [row[0] ?? NaN, row[1] ?? NaN]));

const HistoryUncertaintySchema = z
  .object({
    type: UncertaintyTypeSchema,
    value: ScalarSchema.pipe(z.coerce.number().finite()),
    units: z.string().min(1).optional(),
  })
  .strict();

function checkHistory(
  history: { type: HistoryType; time: HistoryColumn; quantity: HistoryColumn },
  quantityKey: string,
  ctx: z.RefinementCtx,
  options: SchemaOptions
): void {
  if (history.time.column === history.quantity.column) {
    reportSemantic(
      ctx,
      options,
      "history_columns",
      `time and ${quantityKey} must use different columns, both use column ${history.time.column}`,
      [quantityKey, "column"]
    );
  }
  const columns: Array<[string, string, PhysicalKind]> = [
    ["time", history.time.units, "time"],
    [quantityKey, history.quantity.units, HISTORY_QUANTITY_KINDS[history.type]],
  ];
  for (const [key, units, kind] of columns) {
    if (!isKnownUnits(units) || !hasKind(units, kind)) {
      reportSemantic(
        ctx,
        options,
        "unit_dimension",
        `Incompatible units "${units}" for ${history.type} history ${key}: expected units compatible with ${REFERENCE_UNITS[kind]}`,
        [key, "units"]
      );
    }
  }
}

function timeHistorySchema(options: SchemaOptions) {
  return z
    .object({
      type: HistoryTypeSchema,
      time: ColumnSchema,
      quantity: ColumnSchema,
      values: ValuesSchema,
      uncertainty: HistoryUncertaintySchema.optional(),
    })
    .strict()
    .superRefine((history, ctx) => checkHistory(history, "quantity", ctx, options))
    .transform(
      (history): HistoryData => ({
        type: history.type,
        time: history.time,
        quantity: history.quantity,
        values: history.values,
        ...(history.uncertainty !== undefined && { uncertainty: history.uncertainty }),
      })
    );
}

/** The single volume history of ChemKED 0.3 documents. */
function legacyVolumeHistorySchema(options: SchemaOptions) {
  return z
    .object({
      time: ColumnSchema,
      volume: ColumnSchema,
      values: ValuesSchema,
    })
    .strict()
    .superRefine((history, ctx) =>
      checkHistory({ type: "volume", time: history.time, quantity: history.volume }, "volume", ctx, options)
    )
    .transform(
      (history): HistoryData => ({
        type: "volume",
        time: history.time,
        quantity: history.volume,
        values: history.values,
      })
    );
}

export interface DatapointData {
  readonly temperature: ValueNode;
  readonly pressure: ValueNode;
  readonly ignitionDelay: ValueNode;
  readonly firstStageIgnitionDelay?: ValueNode;
  readonly pressureRise?: ValueNode;
  readonly equivalenceRatio?: number;
  readonly composition: CompositionData;
  readonly ignitionType: IgnitionDefinition;
  readonly rcmData?: RcmData;
  readonly timeHistories: readonly HistoryData[];
}

export function datapointSchema(options: SchemaOptions) {
  return z
    .object({
      temperature: valueField(options, { kind: "temperature", positive: true }),
      pressure: valueField(options, { kind: "pressure", positive: true }),
      "ignition-delay": valueField(options, { kind: "time", positive: true }),
      "first-stage-ignition-delay": valueField(options, { kind: "time", positive: true }).optional(),
      "pressure-rise": valueField(options, { kind: "pressure-rise" }).optional(),
      "equivalence-ratio": z.number().min(0).optional(),
      composition: compositionSchema(options),
      "ignition-type": IgnitionDefinitionSchema,
      "rcm-data": rcmDataSchema(options).optional(),
      "time-histories": z.array(timeHistorySchema(options)).optional(),
      "volume-history": legacyVolumeHistorySchema(options).optional(),
    })
    .strict()
    .superRefine((point, ctx) => {
      const histories = [...(point["time-histories"] ?? [])];
      if (point["volume-history"]) histories.push(point["volume-history"]);
      const seen = new Set<HistoryType>();
      for (const history of histories) {
        if (seen.has(history.type)) {
          reportSemantic(
            ctx,
            options,
            "duplicate_history",
            `Only one ${history.type} history may be given per data point`,
            ["time-histories"]
          );
        }
        seen.add(history.type);
      }
    })
    .transform((point): DatapointData => {
      const timeHistories = [...(point["time-histories"] ?? [])];
      if (point["volume-history"]) timeHistories.push(point["volume-history"]);
      return {
        temperature: point.temperature,
        pressure: point.pressure,
        ignitionDelay: point["ignition-delay"],
        ...(point["first-stage-ignition-delay"] && {
          firstStageIgnitionDelay: point["first-stage-ignition-delay"],
        }),
        ...(point["pressure-rise"] && { pressureRise: point["pressure-rise"] }),
        ...(point["equivalence-ratio"] !== undefined && {
          equivalenceRatio: point["equivalence-ratio"],
        }),
        composition: point.composition,
        ignitionType: point["ignition-type"],
        ...(point["rcm-data"] && { rcmData: point["rcm-data"] }),
        timeHistories,
      };
    });
}

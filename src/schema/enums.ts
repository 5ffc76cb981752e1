/**
 * Closed vocabularies of the ChemKED format.
 */

import { z } from "zod";

import type { PhysicalKind } from "../units/index.js";

/** Schema versions this library reads and writes. */
export const SUPPORTED_CHEMKED_VERSIONS = ["0.4.0", "0.4.1"] as const;
export const CURRENT_CHEMKED_VERSION = "0.4.1";

export const EXPERIMENT_TYPES = ["ignition delay"] as const;
export const ExperimentTypeSchema = z.enum(EXPERIMENT_TYPES);
export type ExperimentType = z.infer<typeof ExperimentTypeSchema>;

export const APPARATUS_KINDS = ["shock tube", "rapid compression machine"] as const;
export const ApparatusKindSchema = z.enum(APPARATUS_KINDS);
export type ApparatusKind = z.infer<typeof ApparatusKindSchema>;

export const COMPOSITION_KINDS = ["mole fraction", "mass fraction", "mole percent"] as const;
export const CompositionKindSchema = z.enum(COMPOSITION_KINDS);
export type CompositionKind = z.infer<typeof CompositionKindSchema>;

export const IGNITION_TARGETS = ["temperature", "pressure", "OH", "OH*", "CH", "CH*"] as const;
export const IgnitionTargetSchema = z.enum(IGNITION_TARGETS);
export type IgnitionTarget = z.infer<typeof IgnitionTargetSchema>;

export const IGNITION_TYPES = ["d/dt max", "max", "1/2 max", "min", "d/dt max extrapolated"] as const;
export const IgnitionTypeSchema = z.enum(IGNITION_TYPES);
export type IgnitionType = z.infer<typeof IgnitionTypeSchema>;

export const UNCERTAINTY_TYPES = ["absolute", "relative"] as const;
export const UncertaintyTypeSchema = z.enum(UNCERTAINTY_TYPES);

export const HISTORY_TYPES = [
  "volume",
  "temperature",
  "pressure",
  "piston position",
  "light emission",
  "OH emission",
  "absorption",
] as const;
export const HistoryTypeSchema = z.enum(HISTORY_TYPES);
export type HistoryType = z.infer<typeof HistoryTypeSchema>;

/** Physical kind of the dependent column of each history type. */
export const HISTORY_QUANTITY_KINDS: Record<HistoryType, PhysicalKind> = {
  volume: "volume",
  temperature: "temperature",
  pressure: "pressure",
  "piston position": "length",
  "light emission": "dimensionless",
  "OH emission": "dimensionless",
  absorption: "dimensionless",
};

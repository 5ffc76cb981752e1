/**
 * ChemKED document schema.
 */

export {
  RuleParamsSchema,
  type IssuePath,
  type RuleParams,
  type SchemaOptions,
} from "./context.js";
export {
  compositionSchema,
  compositionTotal,
  isClose,
  type CompositionData,
  type ElementAmount,
  type SpeciesEntry,
  type SpeciesIdentity,
} from "./composition.js";
export {
  datapointSchema,
  IgnitionDefinitionSchema,
  RCM_DATA_KEYS,
  type DatapointData,
  type HistoryColumn,
  type HistoryData,
  type HistoryUncertainty,
  type IgnitionDefinition,
  type RcmData,
} from "./datapoint.js";
export { createChemKEDSchema, type ChemKEDData, type ChemKEDSchema } from "./document.js";
export * from "./enums.js";
export {
  ApparatusSchema,
  authorSchema,
  defaultMaxYear,
  referenceSchema,
  type Apparatus,
  type Author,
  type Reference,
} from "./reference.js";
export { valueField, type ValueFieldOptions, type ValueNode } from "./values.js";

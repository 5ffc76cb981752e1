/**
 * ReSpecTh ⇄ ChemKED conversion.
 */

export { toChemKEDYaml } from "../document/index.js";
export {
  ConversionError,
  MissingAttributeError,
  MissingElementError,
  UnmappedVocabularyError,
} from "./errors.js";
export {
  convertReSpecThToChemKED,
  type ReSpecThReadOptions,
  type ReSpecThReadResult,
} from "./respecth-reader.js";
export {
  convertChemKEDToReSpecTh,
  type DroppedField,
  type ReSpecThWriteOptions,
  type ReSpecThWriteResult,
} from "./respecth-writer.js";
export { parseReSpecTh, type ReSpecThExperiment } from "./respecth-tree.js";
export {
  ignitionTargetFromReSpecTh,
  ignitionTargetToReSpecTh,
  ignitionTypeFromReSpecTh,
  ignitionTypeToReSpecTh,
  RESPECTH_APPARATUS_KINDS,
  RESPECTH_IGNITION_TARGETS,
  RESPECTH_IGNITION_TYPES,
} from "./vocabulary.js";

/**
 * ChemKED toolkit: load, validate and convert combustion experiment records.
 *
 *   const record = await ChemKED.fromFile("experiment.yaml", {
 *     validator: new DocumentValidator({ lookup: new OfflineRegistry() }),
 *   });
 *   record.datapoints[0]?.getMoleFractionString();
 */

export * from "./units/index.js";
export * from "./schema/index.js";
export * from "./document/index.js";
export * from "./validation/index.js";
export * from "./lookup/index.js";
export * from "./record/index.js";
export {
  ConversionError,
  convertChemKEDToReSpecTh,
  convertReSpecThToChemKED,
  MissingAttributeError,
  MissingElementError,
  UnmappedVocabularyError,
  type DroppedField,
  type ReSpecThReadOptions,
  type ReSpecThReadResult,
  type ReSpecThWriteOptions,
  type ReSpecThWriteResult,
} from "./converters/index.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/index.js";
export { ConfigError, loadConfig, validateConfig, type AppConfig } from "./config/index.js";

/**
 * Typed, immutable ChemKED records.
 */

export { ChemKED, type ChemKEDFields, type ChemKEDLoadOptions } from "./chemked.js";
export {
  Composition,
  Species,
  type FractionBasis,
  type SpeciesConversion,
} from "./composition.js";
export {
  DataPoint,
  type DataPointFields,
  type ExperimentConditions,
  type RcmConditions,
  type ShockTubeConditions,
} from "./datapoint.js";
export { MolecularWeightError } from "./errors.js";
export { TimeHistory } from "./history.js";
export {
  atomicWeights,
  elementCounts,
  inchiFormula,
  molecularWeight,
  parseFormula,
} from "./molecular-weight.js";
export { ASYMMETRIC_UNCERTAINTY_MESSAGE, quantityToDocument, toQuantity } from "./quantities.js";
export {
  APPARATUS_COLUMNS,
  REFERENCE_COLUMNS,
  ROW_COLUMNS,
  type DataRow,
  type RowColumn,
  type RowValue,
} from "./rows.js";
export { parseSmiles, SmilesParseError, type ElementCounts } from "./smiles.js";

/**
 * Raw document loading and normalization.
 */

export { DocumentParseError } from "./errors.js";
export { parseChemKEDYaml, readChemKEDFile } from "./loader.js";
export {
  COMMON_PROPERTIES_KEY,
  normalizeDocument,
  type NormalizedDocument,
} from "./normalizer.js";
export { collectNodes, deepCopy, isMapping, type RawMapping } from "./raw.js";
export { toChemKEDYaml } from "./dumper.js";

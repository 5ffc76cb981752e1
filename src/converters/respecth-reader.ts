/**
 * ═══════════════════════════════════════════════════════════════════════════
 * RESPECTH → CHEMKED
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Builds a ChemKED document mapping from a ReSpecTh ignition-delay file:
 *
 *   fileAuthor, bibliographyLink   → file-authors, reference (DOI metadata
 *                                    through the registry lookup)
 *   commonProperties               → common-properties, shared by every point
 *   dataGroup (no time property)   → datapoints, in file order
 *   dataGroup with a time property → time-histories of the first data point
 *   ignitionType                   → ignition-type
 *
 * Shared values are the same object in every data point, so the YAML writer
 * emits them as anchors and aliases.
 */

import { CURRENT_CHEMKED_VERSION, type CompositionKind } from "../schema/index.js";
import { hasKind, isKnownUnits, type PhysicalKind } from "../units/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { fullName, type BibliographicWork, type RegistryLookup } from "../lookup/index.js";
import type { Author } from "../schema/index.js";
import {
  DocumentValidationError,
  DocumentValidator,
  formatWarning,
  normalizeDoi,
  type LookupWarning,
} from "../validation/index.js";
import { ConversionError, MissingAttributeError, MissingElementError, UnmappedVocabularyError } from "./errors.js";
import {
  parseReSpecTh,
  type ReSpecThComponent,
  type ReSpecThDataGroup,
  type ReSpecThExperiment,
  type ReSpecThProperty,
} from "./respecth-tree.js";
import {
  apparatusKindFromReSpecTh,
  COMPOSITION_PROPERTY,
  EQUIVALENCE_RATIO_PROPERTY,
  IGNITION_DELAY_EXPERIMENT,
  ignitionTargetFromReSpecTh,
  ignitionTypeFromReSpecTh,
  INITIAL_COMPOSITION_PROPERTY,
  isReSpecThHistoryType,
  isValueProperty,
  RESPECTH_VALUE_PROPERTIES,
  UNCERTAINTY_PROPERTY,
  unitsFromReSpecTh,
  type ValueField,
} from "./vocabulary.js";

export interface ReSpecThReadOptions {
  /** DOI metadata source; share the validator's client */
  lookup: RegistryLookup;
  /** Added to the file authors of the converted document */
  fileAuthor?: Author;
  /** File name recorded in reference.detail */
  sourceName?: string;
  /** Validate the converted document and throw on failure */
  validate?: boolean;
  validator?: DocumentValidator;
  logger?: Logger;
}

export interface ReSpecThReadResult {
  document: Record<string, unknown>;
  warnings: LookupWarning[];
}

type Mapping = Record<string, unknown>;

interface SpeciesRef {
  name: string;
  inchi?: string;
}

type ColumnDescriptor =
  | { kind: "value"; field: ValueField; units: string }
  | { kind: "equivalence-ratio" }
  | { kind: "composition"; species: SpeciesRef; units: string }
  | { kind: "uncertainty"; spec: UncertaintyDescriptor };

interface UncertaintyDescriptor {
  field: ValueField;
  type: "absolute" | "relative";
  bound: "plusminus" | "plus" | "minus";
  units: string | undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// SMALL READERS
// ═══════════════════════════════════════════════════════════════════════════

class WarningSink {
  readonly warnings: LookupWarning[] = [];

  add(code: LookupWarning["code"], path: string, message: string): void {
    if (this.warnings.some((warning) => warning.path === path && warning.message === message)) return;
    this.warnings.push({ code, path, message });
  }
}

function readNumber(text: string, what: string): number {
  const value = Number(text);
  if (text.trim() === "" || !Number.isFinite(value)) {
    throw new ConversionError(`${what}: "${text}" is not a number`);
  }
  return value;
}

function requireAttribute(value: string | undefined, attribute: string, elementName: string): string {
  if (value === undefined || value.trim() === "") {
    throw new MissingAttributeError(attribute, elementName);
  }
  return value.trim();
}

function checkUnits(units: string, kind: PhysicalKind, property: string): string {
  const normalized = unitsFromReSpecTh(units);
  if (!isKnownUnits(normalized) || !hasKind(normalized, kind)) {
    throw new ConversionError(`Units "${units}" are incompatible with property ${property}`);
  }
  return normalized;
}

function readSpeciesLink(link: ReSpecThComponent["speciesLink"], warnings: WarningSink, path: string): SpeciesRef {
  const name = requireAttribute(link?.["@_preferredKey"], "preferredKey", "speciesLink");
  const inchi = link?.["@_InChI"];
  if (inchi === undefined) {
    warnings.add("conversion_assumption", path, `Missing InChI for species ${name}`);
    return { name };
  }
  return { name, inchi };
}

/**
 * ReSpecTh amounts may be percent, ppm or ppb; ChemKED only has mole and
 * mass fractions and mole percent.
 */
function readAmount(
  text: string,
  units: string | undefined,
  warnings: WarningSink,
  path: string
): { kind: CompositionKind; amount: number } {
  const amount = readNumber(text, "composition amount");
  switch (units) {
    case "mole fraction":
    case "mass fraction":
    case "mole percent":
      return { kind: units, amount };
    case "percent":
      warnings.add("conversion_assumption", path, "Assuming percent in composition means mole percent");
      return { kind: "mole percent", amount };
    case "ppm":
      warnings.add(
        "conversion_assumption",
        path,
        "Assuming molar ppm in composition and converting to mole fraction"
      );
      return { kind: "mole fraction", amount: amount * 1e-6 };
    case "ppb":
      warnings.add(
        "conversion_assumption",
        path,
        "Assuming molar ppb in composition and converting to mole fraction"
      );
      return { kind: "mole fraction", amount: amount * 1e-9 };
    default:
      throw new ConversionError(
        `Composition units need to be one of: mole fraction, mass fraction, mole percent, percent, ppm, or ppb; got "${units ?? ""}"`
      );
  }
}

class CompositionBuilder {
  private kind: CompositionKind | undefined;
  private readonly species: Mapping[] = [];

  add(species: SpeciesRef, amount: { kind: CompositionKind; amount: number }): void {
    if (this.kind !== undefined && this.kind !== amount.kind) {
      throw new ConversionError(`Composition units ${amount.kind} not consistent with ${this.kind}`);
    }
    this.kind = amount.kind;
    this.species.push({
      "species-name": species.name,
      ...(species.inchi !== undefined && { InChI: species.inchi }),
      amount: [amount.amount],
    });
  }

  get empty(): boolean {
    return this.species.length === 0;
  }

  build(): Mapping {
    return { kind: this.kind, species: this.species };
  }
}

function readUncertaintyDescriptor(property: ReSpecThProperty): UncertaintyDescriptor {
  const reference = requireAttribute(property["@_reference"], "reference", "uncertainty property");
  if (!isValueProperty(reference)) {
    throw new ConversionError(`Uncertainty of ${reference} is not supported`);
  }
  const type = requireAttribute(property["@_kind"], "kind", "uncertainty property");
  if (type !== "absolute" && type !== "relative") {
    throw new UnmappedVocabularyError("uncertainty kind", type);
  }
  const bound = property["@_bound"]?.trim() ?? "plusminus";
  if (bound !== "plusminus" && bound !== "plus" && bound !== "minus") {
    throw new UnmappedVocabularyError("uncertainty bound", bound);
  }
  const field = RESPECTH_VALUE_PROPERTIES[reference].field;
  const units = property["@_units"];
  return { field, type, bound, units: units === undefined ? undefined : unitsFromReSpecTh(units) };
}

/**
 * Attach one uncertainty bound to a `[value]` list, turning it into
 * `[value, {uncertainty-type, ...}]`.
 */
function applyUncertainty(point: Mapping, descriptor: UncertaintyDescriptor, text: string): void {
  const current = point[descriptor.field];
  if (!Array.isArray(current) || typeof current[0] !== "string") {
    throw new ConversionError(`Uncertainty given for ${descriptor.field}, which has no value`);
  }
  const valueText = current[0];
  const units = descriptor.units ?? valueText.split(" ").slice(1).join(" ");
  const amount =
    descriptor.type === "relative"
      ? readNumber(text, `${descriptor.field} uncertainty`)
      : `${readNumber(text, `${descriptor.field} uncertainty`)} ${units}`;
  const key =
    descriptor.bound === "plusminus"
      ? "uncertainty"
      : descriptor.bound === "plus"
        ? "upper-uncertainty"
        : "lower-uncertainty";

  const existing: unknown = current[1];
  const spec: Mapping =
    typeof existing === "object" && existing !== null && !Array.isArray(existing)
      ? { ...existing }
      : { "uncertainty-type": descriptor.type };
  spec[key] = amount;
  point[descriptor.field] = [valueText, spec];
}

// ═══════════════════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════════════════

function referenceFromWork(work: BibliographicWork, doi: string): Mapping {
  return {
    doi,
    ...(work.journal !== undefined && { journal: work.journal }),
    ...(work.year !== undefined && { year: work.year }),
    ...(work.volume !== undefined && { volume: work.volume }),
    ...(work.pages !== undefined && { pages: work.pages }),
    authors: work.authors.map((author) => ({
      name: fullName(author),
      ...(author.orcid !== undefined && { ORCID: author.orcid }),
    })),
  };
}

function fallbackDetail(key: string): string {
  return key.endsWith(".") ? key : `${key}.`;
}

async function readReference(
  link: ReSpecThExperiment["bibliographyLink"],
  lookup: RegistryLookup,
  warnings: WarningSink,
  logger: Logger
): Promise<Mapping> {
  if (!link) throw new MissingElementError("bibliographyLink");
  const doi = link["@_doi"]?.trim() || undefined;
  const key = link["@_preferredKey"]?.trim() || undefined;

  if (doi !== undefined) {
    const result = await lookup.lookupDoi(normalizeDoi(doi));
    if (result.status === "found") {
      if (key !== undefined) logger.debug("Using DOI metadata rather than preferredKey", { doi });
      return referenceFromWork(result.work, normalizeDoi(doi));
    }
    const reason = result.status === "not-found" ? "not found" : result.reason;
    if (key === undefined) {
      throw new ConversionError(`DOI ${doi} could not be resolved (${reason}) and preferredKey is not set`);
    }
    warnings.add(
      "reference_fallback",
      "reference",
      `DOI ${doi} could not be resolved (${reason}); preferredKey stored as detail, please fill in the reference`
    );
    return { detail: fallbackDetail(key) };
  }

  if (key !== undefined) {
    warnings.add(
      "reference_fallback",
      "reference",
      "bibliographyLink has no doi; preferredKey stored as detail, please fill in the reference"
    );
    return { detail: fallbackDetail(key) };
  }
  throw new MissingAttributeError("preferredKey", "bibliographyLink");
}

function readCommonProperties(
  properties: readonly ReSpecThProperty[],
  warnings: WarningSink
): { common: Mapping; uncertainties: Array<{ descriptor: UncertaintyDescriptor; text: string }> } {
  const common: Mapping = {};
  const uncertainties: Array<{ descriptor: UncertaintyDescriptor; text: string }> = [];

  for (const property of properties) {
    const name = requireAttribute(property["@_name"], "name", "property");
    if (name === INITIAL_COMPOSITION_PROPERTY) {
      const composition = new CompositionBuilder();
      for (const component of property.component ?? []) {
        const path = "common-properties.composition";
        const species = readSpeciesLink(component.speciesLink, warnings, path);
        if (!component.amount) throw new MissingElementError("component/amount");
        composition.add(species, readAmount(component.amount.text, component.amount.units, warnings, path));
      }
      if (composition.empty) throw new MissingElementError("initial composition/component");
      common.composition = composition.build();
    } else if (isValueProperty(name)) {
      const { field, kind } = RESPECTH_VALUE_PROPERTIES[name];
      const units = checkUnits(requireAttribute(property["@_units"], "units", name), kind, name);
      const text = property.value?.trim() ?? "";
      if (text === "") throw new MissingElementError(`${name}/value`);
      common[field] = [`${text} ${units}`];
    } else if (name === EQUIVALENCE_RATIO_PROPERTY) {
      common["equivalence-ratio"] = readNumber(property.value ?? "", name);
    } else if (name === UNCERTAINTY_PROPERTY) {
      uncertainties.push({ descriptor: readUncertaintyDescriptor(property), text: property.value ?? "" });
    } else {
      throw new ConversionError(`Property ${name} not supported as common property`);
    }
  }

  return { common, uncertainties };
}

function readIgnitionType(ignition: ReSpecThExperiment["ignitionType"]): Mapping {
  if (!ignition) throw new MissingElementError("ignitionType");
  const target = requireAttribute(ignition["@_target"], "target", "ignitionType");
  const type = requireAttribute(ignition["@_type"], "type", "ignitionType");
  if (target.replace(/;$/, "").split(";").length > 1) {
    throw new ConversionError(`Multiple ignition targets not supported: ${target}`);
  }
  return { target: ignitionTargetFromReSpecTh(target), type: ignitionTypeFromReSpecTh(type) };
}

function isHistoryGroup(group: ReSpecThDataGroup): boolean {
  return group.property.some((property) => property["@_name"] === "time");
}

function describeColumns(group: ReSpecThDataGroup, warnings: WarningSink): Map<string, ColumnDescriptor> {
  const columns = new Map<string, ColumnDescriptor>();
  for (const property of group.property) {
    const id = requireAttribute(property["@_id"], "id", "property");
    const name = requireAttribute(property["@_name"], "name", "property");
    if (isValueProperty(name)) {
      const { field, kind } = RESPECTH_VALUE_PROPERTIES[name];
      const units = checkUnits(requireAttribute(property["@_units"], "units", name), kind, name);
      columns.set(id, { kind: "value", field, units });
    } else if (name === EQUIVALENCE_RATIO_PROPERTY) {
      columns.set(id, { kind: "equivalence-ratio" });
    } else if (name === COMPOSITION_PROPERTY) {
      const species = readSpeciesLink(property.speciesLink, warnings, "datapoints");
      columns.set(id, { kind: "composition", species, units: property["@_units"]?.trim() ?? "" });
    } else if (name === UNCERTAINTY_PROPERTY) {
      columns.set(id, { kind: "uncertainty", spec: readUncertaintyDescriptor(property) });
    } else {
      throw new ConversionError(`${name} is not a valid dataPoint property`);
    }
  }
  if (columns.size === 0) throw new MissingElementError("property");
  return columns;
}

function readIgnitionGroup(group: ReSpecThDataGroup, warnings: WarningSink): Mapping[] {
  const columns = describeColumns(group, warnings);
  return group.dataPoint.map((values) => {
    const point: Mapping = {};
    const composition = new CompositionBuilder();
    const pending: Array<{ descriptor: UncertaintyDescriptor; text: string }> = [];

    for (const [tag, text] of Object.entries(values)) {
      const column = columns.get(tag);
      if (!column) {
        throw new ConversionError(`Value ${tag} has no property definition in its dataGroup`);
      }
      switch (column.kind) {
        case "value":
          point[column.field] = [`${text} ${column.units}`];
          break;
        case "equivalence-ratio":
          point["equivalence-ratio"] = readNumber(text, EQUIVALENCE_RATIO_PROPERTY);
          break;
        case "composition":
          composition.add(column.species, readAmount(text, column.units, warnings, "datapoints"));
          break;
        case "uncertainty":
          pending.push({ descriptor: column.spec, text });
          break;
      }
    }

    if (!composition.empty) point.composition = composition.build();
    for (const { descriptor, text } of pending) applyUncertainty(point, descriptor, text);
    return point;
  });
}

function readHistoryGroup(group: ReSpecThDataGroup): Mapping[] {
  let time: { id: string; units: string } | undefined;
  const quantities: Array<{ id: string; type: string; units: string }> = [];

  for (const property of group.property) {
    const id = requireAttribute(property["@_id"], "id", "property");
    const name = property["@_name"] ?? "";
    const units = unitsFromReSpecTh(requireAttribute(property["@_units"], "units", name || "property"));
    if (name === "time") {
      time = { id, units };
    } else if (isReSpecThHistoryType(name)) {
      quantities.push({ id, type: name, units });
    } else {
      throw new ConversionError(
        "Only volume, temperature, pressure, and time are allowed in a time-history dataGroup"
      );
    }
  }
  if (!time || quantities.length === 0) {
    throw new ConversionError("Both time and quantity properties are required for a time history");
  }
  const timeColumn = time;

  const rows = group.dataPoint.map((values) => {
    const timeText = values[timeColumn.id];
    if (timeText === undefined) {
      throw new ConversionError("Every time-history dataPoint needs a time value");
    }
    const row = new Map<string, number>();
    for (const [tag, text] of Object.entries(values)) {
      if (tag === timeColumn.id) continue;
      const quantity = quantities.find((candidate) => candidate.id === tag);
      if (!quantity) throw new ConversionError(`Value tag ${tag} not found in dataGroup properties`);
      row.set(quantity.type, readNumber(text, quantity.type));
    }
    return { time: readNumber(timeText, "time"), row };
  });

  return quantities.map((quantity) => ({
    type: quantity.type,
    time: { units: timeColumn.units, column: 0 },
    quantity: { units: quantity.units, column: 1 },
    values: rows.map(({ time: t, row }) => {
      const value = row.get(quantity.type);
      if (value === undefined) {
        throw new ConversionError(`Time-history dataPoint without a ${quantity.type} value`);
      }
      return [t, value];
    }),
  }));
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Convert a ReSpecTh ignition-delay file to a ChemKED document mapping.
 *
 * @throws ConversionError when the file cannot be expressed in ChemKED
 * @throws DocumentValidationError when `validate` is set and the result is invalid
 */
export async function convertReSpecThToChemKED(
  xml: string,
  options: ReSpecThReadOptions
): Promise<ReSpecThReadResult> {
  const logger = options.logger ?? silentLogger;
  const warnings = new WarningSink();
  const experiment = parseReSpecTh(xml);

  const author = experiment.fileAuthor?.trim() ?? "";
  if (author === "") throw new MissingElementError("fileAuthor");
  const fileAuthors: Mapping[] = [{ name: author }];
  if (options.fileAuthor) {
    fileAuthors.push({
      name: options.fileAuthor.name,
      ...(options.fileAuthor.orcid !== undefined && { ORCID: options.fileAuthor.orcid }),
    });
  }

  const reference = await readReference(experiment.bibliographyLink, options.lookup, warnings, logger);
  if (options.sourceName !== undefined) {
    const note = `Converted from ReSpecTh XML file ${options.sourceName}`;
    reference.detail = typeof reference.detail === "string" ? `${reference.detail} ${note}` : note;
  }

  const experimentType = experiment.experimentType?.trim() ?? "";
  if (experimentType !== IGNITION_DELAY_EXPERIMENT) {
    throw new UnmappedVocabularyError("experiment type", experimentType);
  }
  const kindText = experiment.apparatus?.kind?.trim() ?? "";
  if (kindText === "") throw new MissingElementError("apparatus/kind");
  const apparatusKind = apparatusKindFromReSpecTh(kindText);

  const { common, uncertainties } = readCommonProperties(
    experiment.commonProperties?.property ?? [],
    warnings
  );
  common["ignition-type"] = readIgnitionType(experiment.ignitionType);

  const groups = experiment.dataGroup.filter((group): group is ReSpecThDataGroup => group !== undefined);
  const ignitionGroups = groups.filter((group) => !isHistoryGroup(group));
  if (ignitionGroups.length === 0) throw new MissingElementError("dataGroup");
  const datapoints = ignitionGroups.flatMap((group) => readIgnitionGroup(group, warnings));
  if (datapoints.length === 0) throw new MissingElementError("dataPoint");

  const histories = groups.filter(isHistoryGroup).flatMap(readHistoryGroup);
  const [first] = datapoints;
  if (first && histories.length > 0) first["time-histories"] = histories;

  const merged = datapoints.map((point, index) => {
    for (const field of Object.keys(common)) {
      if (Object.hasOwn(point, field)) {
        throw new ConversionError(
          `datapoints.${index}: ${field} is given both as a common property and in a dataGroup`
        );
      }
    }
    const withCommon: Mapping = { ...point, ...common };
    for (const { descriptor, text } of uncertainties) {
      if (Object.hasOwn(point, descriptor.field)) applyUncertainty(withCommon, descriptor, text);
    }
    return withCommon;
  });
  // Uncertainties of common values are applied once, to the shared node
  for (const { descriptor, text } of uncertainties) {
    if (Object.hasOwn(common, descriptor.field)) {
      applyUncertainty(common, descriptor, text);
      for (const point of merged) point[descriptor.field] = common[descriptor.field];
    }
  }

  const hasPressureRise = merged.some((point) => Object.hasOwn(point, "pressure-rise"));
  if (hasPressureRise && apparatusKind === "rapid compression machine") {
    throw new ConversionError("Pressure rise cannot be defined for a rapid compression machine");
  }
  const hasVolumeHistory = histories.some((history) => history.type === "volume");
  if (hasVolumeHistory && apparatusKind === "shock tube") {
    throw new ConversionError("Volume history cannot be defined for a shock tube");
  }

  const document: Mapping = {
    "file-authors": fileAuthors,
    "file-version": 0,
    "chemked-version": CURRENT_CHEMKED_VERSION,
    reference,
    "experiment-type": "ignition delay",
    apparatus: { kind: apparatusKind },
    "common-properties": common,
    datapoints: merged,
  };

  for (const warning of warnings.warnings) logger.warn(formatWarning(warning));

  if (options.validate) {
    const validator = options.validator ?? new DocumentValidator({ lookup: options.lookup, logger });
    const result = await validator.validate(document);
    if (!result.success) {
      throw new DocumentValidationError(
        `Converted document is invalid (${result.errors.length} error(s))`,
        result.errors,
        result.warnings
      );
    }
  }

  return { document, warnings: warnings.warnings };
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * CHEMKED → RESPECTH
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Writes a record as a ReSpecTh ignition-delay file:
 *
 *   - values equal in every data point go to commonProperties (ignition
 *     delay always stays in the dataGroup); this is a heuristic and not
 *     always the smallest grouping,
 *   - everything else becomes a dataGroup column,
 *   - a single-point record's volume, temperature and pressure histories
 *     become extra dataGroups.
 *
 * ReSpecTh has no place for several ChemKED fields. Each one present in the
 * record is listed in `droppedFields` so callers can tell what was lost.
 */

import { XMLBuilder } from "fast-xml-parser";

import type { ChemKED, Composition, DataPoint, TimeHistory } from "../record/index.js";
import type { Author } from "../schema/index.js";
import type { Quantity } from "../units/index.js";
import { ConversionError } from "./errors.js";
import { ATTRIBUTE_PREFIX } from "./respecth-tree.js";
import {
  COMPOSITION_PROPERTY,
  EQUIVALENCE_RATIO_PROPERTY,
  IGNITION_DELAY_EXPERIMENT,
  ignitionTargetToReSpecTh,
  ignitionTypeToReSpecTh,
  INITIAL_COMPOSITION_PROPERTY,
  isReSpecThHistoryType,
  RESPECTH_APPARATUS_KINDS,
  UNCERTAINTY_PROPERTY,
  UNITLESS,
} from "./vocabulary.js";

export interface ReSpecThWriteOptions {
  /** Replaces the file author written to the file */
  fileAuthor?: Author;
  /** Date stamped on the file; defaults to today */
  now?: Date;
}

export interface DroppedField {
  /** Dotted ChemKED path */
  path: string;
  reason: string;
}

export interface ReSpecThWriteResult {
  xml: string;
  droppedFields: DroppedField[];
}

type XmlNode = Record<string, unknown>;

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>\n';

const RESPECTH_VERSION = { major: 1, minor: 0 };

interface ValueColumn {
  name: string;
  label: string;
  read: (point: DataPoint) => Quantity | undefined;
}

const VALUE_COLUMNS: readonly ValueColumn[] = [
  { name: "temperature", label: "T", read: (point) => point.temperature },
  { name: "pressure", label: "P", read: (point) => point.pressure },
  {
    name: "pressure rise",
    label: "dP/dt",
    read: (point) => (point.experiment.kind === "shock tube" ? point.experiment.pressureRise : undefined),
  },
];

const IGNITION_DELAY_COLUMN: ValueColumn = {
  name: "ignition delay",
  label: "tau",
  read: (point) => point.ignitionDelay,
};

function attributes(values: Record<string, string | number | undefined>): XmlNode {
  const node: XmlNode = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) node[`${ATTRIBUTE_PREFIX}${key}`] = value;
  }
  return node;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function sameQuantity(a: Quantity, b: Quantity): boolean {
  return (
    a.magnitude === b.magnitude &&
    a.units === b.units &&
    a.uncertainty?.kind === b.uncertainty?.kind &&
    a.uncertainty?.value === b.uncertainty?.value
  );
}

function sameComposition(a: Composition, b: Composition): boolean {
  return (
    a.kind === b.kind &&
    a.species.length === b.species.length &&
    a.species.every((species, i) => {
      const other = b.species[i];
      return (
        other !== undefined &&
        species.name === other.name &&
        species.inchi === other.inchi &&
        sameQuantity(species.amount, other.amount)
      );
    })
  );
}

function uncertaintyUnits(quantity: Quantity): string {
  return quantity.uncertainty?.kind === "relative" ? UNITLESS : quantity.units;
}

/**
 * Collects the XML tree and the list of dropped fields.
 */
class ReSpecThWriter {
  readonly dropped: DroppedField[] = [];
  private readonly commonProperties: XmlNode[] = [];
  private readonly groupProperties: XmlNode[] = [];
  private readonly columns: Array<(point: DataPoint) => string | number> = [];

  constructor(private readonly record: ChemKED) {}

  drop(path: string, reason: string): void {
    this.dropped.push({ path, reason });
  }

  private nextId(): string {
    return `x${this.groupProperties.length + 1}`;
  }

  private addColumn(property: XmlNode, value: (point: DataPoint) => string | number): void {
    const id = this.nextId();
    this.groupProperties.push({ ...property, ...attributes({ id }) });
    this.columns.push(value);
  }

  private addCommonValue(column: ValueColumn, quantity: Quantity): void {
    this.commonProperties.push({
      ...attributes({ name: column.name, label: column.label, units: quantity.units, sourcetype: "reported" }),
      value: quantity.magnitude,
    });
    if (quantity.uncertainty) {
      this.commonProperties.push({
        ...attributes({
          name: UNCERTAINTY_PROPERTY,
          reference: column.name,
          kind: quantity.uncertainty.kind,
          bound: "plusminus",
          units: uncertaintyUnits(quantity),
          sourcetype: "reported",
        }),
        value: quantity.uncertainty.value,
      });
    }
  }

  private addValueColumn(column: ValueColumn, quantities: Quantity[]): void {
    const [first] = quantities;
    if (!first) return;
    const units = first.units;
    const converted = quantities.map((quantity) => (quantity.units === units ? quantity : quantity.to(units)));
    const points = this.record.datapoints;
    const valueOf = (point: DataPoint): number => converted[points.indexOf(point)]?.magnitude ?? NaN;

    this.addColumn(
      attributes({ name: column.name, label: column.label, units, sourcetype: "reported" }),
      valueOf
    );

    const kind = first.uncertainty?.kind;
    const uniform = kind !== undefined && converted.every((quantity) => quantity.uncertainty?.kind === kind);
    if (uniform) {
      this.addColumn(
        attributes({
          name: UNCERTAINTY_PROPERTY,
          label: `d_${column.label}`,
          reference: column.name,
          kind,
          bound: "plusminus",
          units: uncertaintyUnits(first),
          sourcetype: "reported",
        }),
        (point) => converted[points.indexOf(point)]?.uncertainty?.value ?? NaN
      );
    } else if (converted.some((quantity) => quantity.uncertainty !== undefined)) {
      const field = column.name.replace(/ /g, "-");
      this.drop(
        `datapoints.*.${field}`,
        "uncertainty is not given the same way for every data point"
      );
    }
  }

  /** Values shared by all points go to commonProperties, the rest to columns. */
  private writeValue(column: ValueColumn): void {
    const points = this.record.datapoints;
    const quantities = points.map(column.read);
    const present = quantities.filter((quantity): quantity is Quantity => quantity !== undefined);
    if (present.length === 0) return;
    if (present.length !== quantities.length) {
      throw new ConversionError(`${column.name} must be given for every data point or none`);
    }
    const [first] = present;
    if (first && column !== IGNITION_DELAY_COLUMN && present.every((q) => sameQuantity(q, first))) {
      this.addCommonValue(column, first);
    } else {
      this.addValueColumn(column, present);
    }
  }

  private writeEquivalenceRatio(): void {
    const ratios = this.record.datapoints.map((point) => point.equivalenceRatio);
    const present = ratios.filter((ratio): ratio is number => ratio !== undefined);
    if (present.length === 0) return;
    if (present.length !== ratios.length) {
      throw new ConversionError("equivalence-ratio must be given for every data point or none");
    }
    const [first] = present;
    if (present.every((ratio) => ratio === first)) {
      this.commonProperties.push({
        ...attributes({ name: EQUIVALENCE_RATIO_PROPERTY, label: "phi", units: UNITLESS, sourcetype: "reported" }),
        value: first,
      });
    } else {
      this.addColumn(
        attributes({ name: EQUIVALENCE_RATIO_PROPERTY, label: "phi", units: UNITLESS, sourcetype: "reported" }),
        (point) => point.equivalenceRatio ?? NaN
      );
    }
  }

  private checkSpecies(composition: Composition, path: string): void {
    composition.species.forEach((species, index) => {
      const speciesPath = `${path}.species.${index}`;
      if (species.identity.kind === "atomic-composition") {
        this.drop(`${speciesPath}.atomic-composition`, "speciesLink only carries an InChI");
      } else if (species.identity.kind === "SMILES") {
        this.drop(`${speciesPath}.SMILES`, "speciesLink only carries an InChI");
      }
      if (species.amount.uncertainty) {
        this.drop(`${speciesPath}.amount`, "composition uncertainty has no ReSpecTh equivalent");
      }
    });
  }

  private writeComposition(): void {
    const points = this.record.datapoints;
    const [first] = points;
    if (!first) return;
    const shared = points.every((point) => sameComposition(point.composition, first.composition));

    if (shared) {
      this.checkSpecies(first.composition, "datapoints.*.composition");
      this.commonProperties.push({
        ...attributes({ name: INITIAL_COMPOSITION_PROPERTY, sourcetype: "reported" }),
        component: first.composition.species.map((species) => ({
          speciesLink: attributes({ preferredKey: species.name, InChI: species.inchi }),
          amount: { ...attributes({ units: first.composition.kind }), "#text": species.amount.magnitude },
        })),
      });
      return;
    }

    const names = first.composition.species.map((species) => species.name);
    points.forEach((point, index) => {
      const same =
        point.composition.kind === first.composition.kind &&
        point.composition.species.length === names.length &&
        point.composition.species.every((species, i) => species.name === names[i]);
      if (!same) {
        throw new ConversionError(
          `datapoints.${index}: every data point must list the same species in the same basis`
        );
      }
      this.checkSpecies(point.composition, `datapoints.${index}.composition`);
    });

    first.composition.species.forEach((species, i) => {
      this.addColumn(
        {
          ...attributes({ name: COMPOSITION_PROPERTY, label: `[${species.name}]`, units: first.composition.kind, sourcetype: "reported" }),
          speciesLink: attributes({ preferredKey: species.name, InChI: species.inchi }),
        },
        (point) => point.composition.species[i]?.amount.magnitude ?? NaN
      );
    });
  }

  private ignitionType(): XmlNode {
    const [first, ...rest] = this.record.datapoints;
    if (!first) throw new ConversionError("A record without data points cannot be written");
    const { target, type } = first.ignitionType;
    rest.forEach((point, index) => {
      if (point.ignitionType.target !== target || point.ignitionType.type !== type) {
        throw new ConversionError(
          `datapoints.${index + 1}: ReSpecTh files hold a single ignition definition, but data points differ`
        );
      }
    });
    return attributes({ target: ignitionTargetToReSpecTh(target), type: ignitionTypeToReSpecTh(type) });
  }

  private historyGroups(): XmlNode[] {
    const points = this.record.datapoints;
    const groups: XmlNode[] = [];
    points.forEach((point, index) => {
      point.timeHistories.forEach((history, h) => {
        const path = `datapoints.${index}.time-histories.${h}`;
        if (points.length > 1) {
          this.drop(path, "time histories are only written for single-point records");
        } else if (!isReSpecThHistoryType(history.type)) {
          this.drop(path, `${history.type} histories have no ReSpecTh equivalent`);
        } else {
          if (history.uncertainty) this.drop(`${path}.uncertainty`, "history uncertainty has no ReSpecTh equivalent");
          groups.push(this.historyGroup(history, groups.length + 2));
        }
      });
    });
    return groups;
  }

  private historyGroup(history: TimeHistory, number: number): XmlNode {
    const timeId = `x${number}1`;
    const quantityId = `x${number}2`;
    const times = history.times();
    const quantities = history.quantities();
    return {
      ...attributes({ id: `dg${number}` }),
      property: [
        attributes({ name: "time", id: timeId, label: "t", units: history.timeUnits, sourcetype: "reported" }),
        attributes({
          name: history.type,
          id: quantityId,
          label: history.type.charAt(0).toUpperCase(),
          units: history.quantityUnits,
          sourcetype: "reported",
        }),
      ],
      dataPoint: times.map((time, i) => ({ [timeId]: time, [quantityId]: quantities[i] })),
    };
  }

  private recordDroppedMetadata(fileAuthor: Author | undefined): void {
    const record = this.record;
    const authors = fileAuthor ? [fileAuthor] : record.fileAuthors;
    if (fileAuthor) {
      record.fileAuthors.forEach((_author, index) =>
        this.drop(`file-authors.${index}`, "replaced by the given file author")
      );
    } else {
      authors.slice(1).forEach((_author, index) =>
        this.drop(`file-authors.${index + 1}`, "ReSpecTh files have a single fileAuthor")
      );
    }
    if (authors[0]?.orcid !== undefined) {
      this.drop(fileAuthor ? "fileAuthor.ORCID" : "file-authors.0.ORCID", "fileAuthor carries only a name");
    }

    const reference = record.reference;
    const bibliographic = ["journal", "volume", "pages"] as const;
    this.drop("reference.authors", "bibliographyLink carries only a DOI and a preferredKey");
    this.drop("reference.year", "bibliographyLink carries only a DOI and a preferredKey");
    for (const key of bibliographic) {
      if (reference[key] !== undefined) {
        this.drop(`reference.${key}`, "bibliographyLink carries only a DOI and a preferredKey");
      }
    }
    if (record.apparatus.institution !== undefined) {
      this.drop("apparatus.institution", "apparatus carries only its kind");
    }
    if (record.apparatus.facility !== undefined) {
      this.drop("apparatus.facility", "apparatus carries only its kind");
    }

    record.datapoints.forEach((point, index) => {
      if (point.firstStageIgnitionDelay) {
        this.drop(`datapoints.${index}.first-stage-ignition-delay`, "no ReSpecTh property for it");
      }
      const experiment = point.experiment;
      if (experiment.kind === "rapid compression machine") {
        const fields = Object.entries(experiment).filter(([key, value]) => key !== "kind" && value);
        if (fields.length > 0) {
          this.drop(`datapoints.${index}.rcm-data`, "no ReSpecTh property for it");
        }
      }
    });

    for (const warning of record.warnings) {
      if (warning.code === "asymmetric_uncertainty") {
        this.drop(warning.path, "asymmetric uncertainty was already collapsed to its larger bound");
      }
    }
  }

  build(options: ReSpecThWriteOptions): XmlNode {
    const record = this.record;
    const author = options.fileAuthor?.name ?? record.fileAuthors[0]?.name ?? "";
    const date = isoDate(options.now ?? new Date());

    this.recordDroppedMetadata(options.fileAuthor);

    for (const column of VALUE_COLUMNS) this.writeValue(column);
    this.writeEquivalenceRatio();
    this.writeComposition();
    this.writeValue(IGNITION_DELAY_COLUMN);
    const ignitionType = this.ignitionType();
    const historyGroups = this.historyGroups();

    const dataPoints = record.datapoints.map((point) => {
      const row: XmlNode = {};
      this.columns.forEach((value, i) => {
        row[`x${i + 1}`] = value(point);
      });
      return row;
    });

    const preferredKey = record.reference.detail;
    return {
      experiment: {
        fileAuthor: author,
        fileVersion: { major: record.fileVersion, minor: 0 },
        ReSpecThVersion: RESPECTH_VERSION,
        firstPublicationDate: date,
        lastModificationDate: date,
        bibliographyLink: attributes({ preferredKey, doi: record.reference.doi }),
        experimentType: IGNITION_DELAY_EXPERIMENT,
        apparatus: { kind: RESPECTH_APPARATUS_KINDS[record.apparatus.kind] },
        commonProperties: { property: this.commonProperties },
        dataGroup: [
          { ...attributes({ id: "dg1" }), property: this.groupProperties, dataPoint: dataPoints },
          ...historyGroups,
        ],
        ignitionType,
      },
    };
  }
}

/**
 * Write a record as ReSpecTh XML.
 *
 * @throws ConversionError when the record cannot be expressed (differing
 *   ignition definitions or species lists across data points)
 */
export function convertChemKEDToReSpecTh(
  record: ChemKED,
  options: ReSpecThWriteOptions = {}
): ReSpecThWriteResult {
  const writer = new ReSpecThWriter(record);
  const tree = writer.build(options);
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  return { xml: XML_DECLARATION + builder.build(tree), droppedFields: writer.dropped };
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * CHEMKED RECORD
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Immutable view of a validated document. Construction goes through the
 * validator unless the caller opts out with `skipValidation`, in which case
 * the document is only decoded (structural rules still apply).
 *
 * "Editing" a record means building a new one: `withFileVersion` returns a
 * copy, and `toDocument` gives back a plain mapping that validates again.
 * `toRows` flattens the data points into table rows.
 */

import { parseChemKEDYaml, readChemKEDFile, toChemKEDYaml } from "../document/index.js";
import type { Apparatus, Author, ChemKEDData, ExperimentType, Reference } from "../schema/index.js";
import {
  decodeDocument,
  DocumentValidationError,
  DocumentValidator,
  type LookupWarning,
  type ValidationResult,
} from "../validation/index.js";
import { DataPoint } from "./datapoint.js";
import { deepFreeze } from "./freeze.js";
import { recordRows, type DataRow } from "./rows.js";

export interface ChemKEDLoadOptions {
  /** Validator to run; defaults to one without registry checks */
  validator?: DocumentValidator;
  /** Decode only: skip semantic and registry rules */
  skipValidation?: boolean;
}

export interface ChemKEDFields {
  fileAuthors: readonly Author[];
  fileVersion: number;
  chemkedVersion: string;
  reference: Reference;
  experimentType: ExperimentType;
  apparatus: Apparatus;
  datapoints: readonly DataPoint[];
  warnings?: readonly LookupWarning[];
}

function authorToDocument(author: Author): Record<string, unknown> {
  return author.orcid === undefined ? { name: author.name } : { name: author.name, ORCID: author.orcid };
}

export class ChemKED {
  readonly fileAuthors: readonly Author[];
  readonly fileVersion: number;
  readonly chemkedVersion: string;
  readonly reference: Reference;
  readonly experimentType: ExperimentType;
  readonly apparatus: Apparatus;
  readonly datapoints: readonly DataPoint[];
  /** Validation and construction warnings */
  readonly warnings: readonly LookupWarning[];

  constructor(fields: ChemKEDFields) {
    this.fileAuthors = fields.fileAuthors.map((author) => ({ ...author }));
    this.fileVersion = fields.fileVersion;
    this.chemkedVersion = fields.chemkedVersion;
    this.reference = {
      ...fields.reference,
      authors: fields.reference.authors.map((author) => ({ ...author })),
    };
    this.experimentType = fields.experimentType;
    this.apparatus = { ...fields.apparatus };
    this.datapoints = [...fields.datapoints];
    this.warnings = (fields.warnings ?? []).map((warning) => ({ ...warning }));
    deepFreeze(this);
  }

  /**
   * Validate (or decode) a raw document and build the record.
   *
   * @throws DocumentValidationError with every issue found
   */
  static async fromDocument(raw: unknown, options: ChemKEDLoadOptions = {}): Promise<ChemKED> {
    const result: ValidationResult = options.skipValidation
      ? decodeDocument(raw)
      : await (options.validator ?? new DocumentValidator()).validate(raw);
    if (!result.success || !result.data) {
      throw new DocumentValidationError(
        `ChemKED document is invalid (${result.errors.length} error(s))`,
        result.errors,
        result.warnings
      );
    }
    return ChemKED.fromData(result.data, result.warnings);
  }

  static async fromYaml(text: string, options: ChemKEDLoadOptions = {}): Promise<ChemKED> {
    return ChemKED.fromDocument(parseChemKEDYaml(text), options);
  }

  static async fromFile(path: string, options: ChemKEDLoadOptions = {}): Promise<ChemKED> {
    return ChemKED.fromDocument(readChemKEDFile(path), options);
  }

  /** Build from decoded data; `warnings` are carried onto the record. */
  static fromData(data: ChemKEDData, warnings: readonly LookupWarning[] = []): ChemKED {
    const collected = [...warnings];
    const datapoints = data.datapoints.map((point, index) =>
      DataPoint.fromData(point, data.apparatus.kind, `datapoints.${index}`, collected)
    );
    return new ChemKED({
      fileAuthors: data.fileAuthors,
      fileVersion: data.fileVersion,
      chemkedVersion: data.chemkedVersion,
      reference: data.reference,
      experimentType: data.experimentType,
      apparatus: data.apparatus,
      datapoints,
      warnings: collected,
    });
  }

  withFileVersion(fileVersion: number): ChemKED {
    if (!Number.isInteger(fileVersion) || fileVersion < 0) {
      throw new RangeError(`file-version must be a non-negative integer, got ${fileVersion}`);
    }
    return new ChemKED({ ...this, fileVersion });
  }

  toDocument(): Record<string, unknown> {
    const { authors, ...bibliographic } = this.reference;
    return {
      "file-authors": this.fileAuthors.map(authorToDocument),
      "file-version": this.fileVersion,
      "chemked-version": this.chemkedVersion,
      reference: { ...bibliographic, authors: authors.map(authorToDocument) },
      "experiment-type": this.experimentType,
      apparatus: { ...this.apparatus },
      datapoints: this.datapoints.map((point) => point.toDocument()),
    };
  }

  toYaml(): string {
    return toChemKEDYaml(this.toDocument());
  }

  /**
   * One plain row per data point, for tables and CSV. With no columns given,
   * every column is included; see {@link ROW_COLUMNS}.
   */
  toRows(columns: readonly string[] = []): DataRow[] {
    return recordRows(this, columns);
  }
}

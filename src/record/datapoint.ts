/**
 * One measurement with its conditions.
 *
 * Apparatus-specific fields live on `experiment`, a sum type discriminated
 * by apparatus kind, instead of optional fields on every data point.
 */

import type {
  ApparatusKind,
  DatapointData,
  HistoryType,
  IgnitionDefinition,
  RcmData,
} from "../schema/index.js";
import { RCM_DATA_KEYS } from "../schema/index.js";
import type { Quantity } from "../units/index.js";
import type { LookupWarning } from "../validation/index.js";
import { Composition, type FractionBasis, type SpeciesConversion } from "./composition.js";
import { deepFreeze } from "./freeze.js";
import { TimeHistory } from "./history.js";
import { quantityToDocument, toQuantity } from "./quantities.js";

export interface ShockTubeConditions {
  readonly kind: "shock tube";
  readonly pressureRise?: Quantity;
}

export interface RcmConditions {
  readonly kind: "rapid compression machine";
  readonly compressedPressure?: Quantity;
  readonly compressedTemperature?: Quantity;
  readonly compressionTime?: Quantity;
  readonly stroke?: Quantity;
  readonly clearance?: Quantity;
  readonly compressionRatio?: Quantity;
}

export type ExperimentConditions = ShockTubeConditions | RcmConditions;

export interface DataPointFields {
  temperature: Quantity;
  pressure: Quantity;
  ignitionDelay: Quantity;
  firstStageIgnitionDelay?: Quantity;
  equivalenceRatio?: number;
  composition: Composition;
  ignitionType: IgnitionDefinition;
  experiment: ExperimentConditions;
  timeHistories: readonly TimeHistory[];
}

function rcmConditions(data: RcmData | undefined, path: string, warnings: LookupWarning[]): RcmConditions {
  const conditions: { -readonly [K in keyof RcmConditions]: RcmConditions[K] } = {
    kind: "rapid compression machine",
  };
  if (!data) return conditions;
  for (const field of Object.keys(RCM_DATA_KEYS)) {
    if (!isRcmField(field)) continue;
    const node = data[field];
    if (node) conditions[field] = toQuantity(node, `${path}.rcm-data.${RCM_DATA_KEYS[field]}`, warnings);
  }
  return conditions;
}

function isRcmField(field: string): field is keyof RcmData {
  return Object.hasOwn(RCM_DATA_KEYS, field);
}

export class DataPoint {
  readonly temperature: Quantity;
  readonly pressure: Quantity;
  readonly ignitionDelay: Quantity;
  readonly firstStageIgnitionDelay: Quantity | undefined;
  readonly equivalenceRatio: number | undefined;
  readonly composition: Composition;
  readonly ignitionType: IgnitionDefinition;
  readonly experiment: ExperimentConditions;
  readonly timeHistories: readonly TimeHistory[];

  constructor(fields: DataPointFields) {
    this.temperature = fields.temperature;
    this.pressure = fields.pressure;
    this.ignitionDelay = fields.ignitionDelay;
    this.firstStageIgnitionDelay = fields.firstStageIgnitionDelay;
    this.equivalenceRatio = fields.equivalenceRatio;
    this.composition = fields.composition;
    this.ignitionType = { target: fields.ignitionType.target, type: fields.ignitionType.type };
    this.experiment = fields.experiment;
    this.timeHistories = [...fields.timeHistories];
    deepFreeze(this);
  }

  /**
   * Build from decoded data. `path` locates the point in the document for
   * warnings, e.g. `datapoints.0`.
   */
  static fromData(
    data: DatapointData,
    apparatus: ApparatusKind,
    path: string,
    warnings: LookupWarning[]
  ): DataPoint {
    const experiment: ExperimentConditions =
      apparatus === "shock tube"
        ? {
            kind: "shock tube",
            ...(data.pressureRise && {
              pressureRise: toQuantity(data.pressureRise, `${path}.pressure-rise`, warnings),
            }),
          }
        : rcmConditions(data.rcmData, path, warnings);

    return new DataPoint({
      temperature: toQuantity(data.temperature, `${path}.temperature`, warnings),
      pressure: toQuantity(data.pressure, `${path}.pressure`, warnings),
      ignitionDelay: toQuantity(data.ignitionDelay, `${path}.ignition-delay`, warnings),
      ...(data.firstStageIgnitionDelay && {
        firstStageIgnitionDelay: toQuantity(
          data.firstStageIgnitionDelay,
          `${path}.first-stage-ignition-delay`,
          warnings
        ),
      }),
      ...(data.equivalenceRatio !== undefined && { equivalenceRatio: data.equivalenceRatio }),
      composition: Composition.fromData(data.composition, `${path}.composition`, warnings),
      ignitionType: data.ignitionType,
      experiment,
      timeHistories: data.timeHistories.map((history) => new TimeHistory(history)),
    });
  }

  timeHistory(type: HistoryType): TimeHistory | undefined {
    return this.timeHistories.find((history) => history.type === type);
  }

  get volumeHistory(): TimeHistory | undefined {
    return this.timeHistory("volume");
  }

  /** "H2:0.125, O2:0.0625, ..." as mole fractions. */
  getMoleFractionString(speciesConversion?: SpeciesConversion): string {
    return this.composition.toFractionString("mole", speciesConversion);
  }

  /** "H2:0.0126, O2:0.1, ..." as mass fractions. */
  getMassFractionString(speciesConversion?: SpeciesConversion): string {
    return this.composition.toFractionString("mass", speciesConversion);
  }

  getCompositionString(basis: FractionBasis, speciesConversion?: SpeciesConversion): string {
    return this.composition.toFractionString(basis, speciesConversion);
  }

  toDocument(): Record<string, unknown> {
    const document: Record<string, unknown> = {
      temperature: quantityToDocument(this.temperature),
      pressure: quantityToDocument(this.pressure),
      "ignition-delay": quantityToDocument(this.ignitionDelay),
    };
    if (this.firstStageIgnitionDelay) {
      document["first-stage-ignition-delay"] = quantityToDocument(this.firstStageIgnitionDelay);
    }
    if (this.equivalenceRatio !== undefined) {
      document["equivalence-ratio"] = this.equivalenceRatio;
    }
    document.composition = this.composition.toDocument();
    document["ignition-type"] = { ...this.ignitionType };

    const experiment = this.experiment;
    if (experiment.kind === "shock tube") {
      if (experiment.pressureRise) {
        document["pressure-rise"] = quantityToDocument(experiment.pressureRise);
      }
    } else {
      const rcmData: Record<string, unknown> = {};
      for (const field of Object.keys(RCM_DATA_KEYS)) {
        if (!isRcmField(field)) continue;
        const quantity = experiment[field];
        if (quantity) rcmData[RCM_DATA_KEYS[field]] = quantityToDocument(quantity);
      }
      if (Object.keys(rcmData).length > 0) document["rcm-data"] = rcmData;
    }

    if (this.timeHistories.length > 0) {
      document["time-histories"] = this.timeHistories.map((history) => history.toDocument());
    }
    return document;
  }
}

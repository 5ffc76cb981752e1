/**
 * Time history of one quantity (volume, pressure, emission, ...).
 */

import type { HistoryData, HistoryType, HistoryUncertainty } from "../schema/index.js";
import { convertMagnitude } from "../units/index.js";
import { deepFreeze } from "./freeze.js";

export class TimeHistory {
  readonly type: HistoryType;
  readonly timeUnits: string;
  readonly quantityUnits: string;
  readonly timeColumn: number;
  readonly quantityColumn: number;
  /** Rows as given in the document, column order preserved */
  readonly values: ReadonlyArray<readonly [number, number]>;
  readonly uncertainty: HistoryUncertainty | undefined;

  constructor(data: HistoryData) {
    this.type = data.type;
    this.timeUnits = data.time.units;
    this.quantityUnits = data.quantity.units;
    this.timeColumn = data.time.column;
    this.quantityColumn = data.quantity.column;
    this.values = data.values.map((row): readonly [number, number] => [row[0], row[1]]);
    this.uncertainty = data.uncertainty ? { ...data.uncertainty } : undefined;
    deepFreeze(this);
  }

  get length(): number {
    return this.values.length;
  }

  /** Time column, converted to `units` when given. */
  times(units: string = this.timeUnits): number[] {
    return this.values.map((row) => convertMagnitude(row[this.timeColumn] ?? NaN, this.timeUnits, units));
  }

  /** Quantity column, converted to `units` when given. */
  quantities(units: string = this.quantityUnits): number[] {
    return this.values.map((row) =>
      convertMagnitude(row[this.quantityColumn] ?? NaN, this.quantityUnits, units)
    );
  }

  toDocument(): Record<string, unknown> {
    return {
      type: this.type,
      time: { units: this.timeUnits, column: this.timeColumn },
      quantity: { units: this.quantityUnits, column: this.quantityColumn },
      values: this.values.map((row) => [row[0], row[1]]),
      ...(this.uncertainty && { uncertainty: { ...this.uncertainty } }),
    };
  }
}

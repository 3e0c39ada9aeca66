/**
 * Perfdata: a named metric observed by a monitoring check.
 *
 * A record carries a unit-tagged value, optional warning and critical
 * threshold ranges that decide its status, and optional min/max bounds
 * used downstream to scale visualizations.
 *
 * Records are immutable. The `withX` builders return updated copies.
 * JavaScript strings are values, so a parsed record keeps its own copy
 * of the label and does not depend on the input text staying alive.
 */

import type { MonitoringStatus } from "../types/status.js";
import type { MeasuredUnit, UnitValue } from "../types/unit.js";
import { UNIT_SUFFIXES } from "../types/unit.js";
import { formatNumber } from "./number.js";
import type { ThresholdRange } from "./threshold-range.js";

interface PerfdataFields {
  readonly label: string;
  readonly unit: UnitValue;
  readonly warn: ThresholdRange | undefined;
  readonly crit: ThresholdRange | undefined;
  readonly min: number | undefined;
  readonly max: number | undefined;
}

/**
 * Labels that cannot be written back in canonical form are rejected.
 * Throws: this is a programmer error, unlike malformed parser input.
 */
function assertValidLabel(label: string): void {
  if (label.length === 0) {
    throw new Error("Perfdata label must not be empty");
  }
  if (label.includes("'")) {
    throw new Error(`Perfdata label "${label}" must not contain a single quote`);
  }
  if (label.includes("=")) {
    throw new Error(`Perfdata label "${label}" must not contain an equals sign`);
  }
}

/**
 * The value scan of the token grammar has no spelling for infinities or
 * NaN, so a measured value must be finite. Bounds and ranges may be
 * non-finite.
 */
function assertFiniteValue(label: string, unit: UnitValue): void {
  if (unit.kind !== "undetermined" && !Number.isFinite(unit.value)) {
    throw new Error(`Perfdata "${label}" value must be a finite number, got ${unit.value}`);
  }
}

function formatUnitValue(unit: UnitValue): string {
  if (unit.kind === "undetermined") {
    return "U";
  }
  return formatNumber(unit.value) + UNIT_SUFFIXES[unit.kind];
}

function formatRangeField(range: ThresholdRange | undefined): string {
  return range === undefined ? ";" : `${range.toString()};`;
}

function formatBoundField(bound: number | undefined): string {
  return bound === undefined ? ";" : `${formatNumber(bound)};`;
}

function sameRange(a: ThresholdRange | undefined, b: ThresholdRange | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.equals(b);
}

export class Perfdata {
  readonly label: string;
  readonly unit: UnitValue;
  readonly warn: ThresholdRange | undefined;
  readonly crit: ThresholdRange | undefined;
  readonly min: number | undefined;
  readonly max: number | undefined;

  private constructor(fields: PerfdataFields) {
    this.label = fields.label;
    this.unit = fields.unit;
    this.warn = fields.warn;
    this.crit = fields.crit;
    this.min = fields.min;
    this.max = fields.max;
  }

  /**
   * Create a record from an already tagged value.
   */
  static of(label: string, unit: UnitValue): Perfdata {
    assertValidLabel(label);
    assertFiniteValue(label, unit);
    return new Perfdata({
      label,
      unit,
      warn: undefined,
      crit: undefined,
      min: undefined,
      max: undefined,
    });
  }

  private static measured(label: string, kind: MeasuredUnit, value: number): Perfdata {
    return Perfdata.of(label, { kind, value });
  }

  /** A plain count of things, without a unit. */
  static unit(label: string, value: number): Perfdata {
    return Perfdata.measured(label, "none", value);
  }

  static percentage(label: string, value: number): Perfdata {
    return Perfdata.measured(label, "percentage", value);
  }

  static seconds(label: string, value: number): Perfdata {
    return Perfdata.measured(label, "seconds", value);
  }

  static bytes(label: string, value: number): Perfdata {
    return Perfdata.measured(label, "bytes", value);
  }

  /** A continuous counter, such as bytes transmitted on an interface. */
  static counter(label: string, value: number): Perfdata {
    return Perfdata.measured(label, "counter", value);
  }

  /** The check could not obtain a value. */
  static undetermined(label: string): Perfdata {
    return Perfdata.of(label, { kind: "undetermined" });
  }

  private update(patch: Partial<PerfdataFields>): Perfdata {
    return new Perfdata({ ...this.fields(), ...patch });
  }

  private fields(): PerfdataFields {
    return {
      label: this.label,
      unit: this.unit,
      warn: this.warn,
      crit: this.crit,
      min: this.min,
      max: this.max,
    };
  }

  withWarn(range: ThresholdRange): Perfdata {
    return this.update({ warn: range });
  }

  withCrit(range: ThresholdRange): Perfdata {
    return this.update({ crit: range });
  }

  withMin(min: number): Perfdata {
    return this.update({ min });
  }

  withMax(max: number): Perfdata {
    return this.update({ max });
  }

  /**
   * The measured number, or undefined for an undetermined value.
   */
  value(): number | undefined {
    return this.unit.kind === "undetermined" ? undefined : this.unit.value;
  }

  isWarn(): boolean {
    return this.alerts(this.warn);
  }

  isCrit(): boolean {
    return this.alerts(this.crit);
  }

  private alerts(range: ThresholdRange | undefined): boolean {
    const value = this.value();
    if (value === undefined || range === undefined) {
      return false;
    }
    return range.isAlert(value);
  }

  /**
   * Critical wins over warning; the two ranges are evaluated
   * independently and need not be nested.
   */
  status(): MonitoringStatus {
    if (this.isCrit()) {
      return "Critical";
    }
    if (this.isWarn()) {
      return "Warning";
    }
    return "OK";
  }

  hasThresholdsOrLimits(): boolean {
    return (
      this.warn !== undefined ||
      this.crit !== undefined ||
      this.min !== undefined ||
      this.max !== undefined
    );
  }

  equals(other: Perfdata): boolean {
    return (
      this.label === other.label &&
      this.unit.kind === other.unit.kind &&
      this.value() === other.value() &&
      sameRange(this.warn, other.warn) &&
      sameRange(this.crit, other.crit) &&
      this.min === other.min &&
      this.max === other.max
    );
  }

  /**
   * Canonical token: `'label'=value[unit];` followed by
   * `warn;crit;min;max;` when any of those four is set.
   */
  toString(): string {
    let text = `'${this.label}'=${formatUnitValue(this.unit)};`;
    if (this.hasThresholdsOrLimits()) {
      text +=
        formatRangeField(this.warn) +
        formatRangeField(this.crit) +
        formatBoundField(this.min) +
        formatBoundField(this.max);
    }
    return text;
  }
}

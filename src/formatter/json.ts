/**
 * JSON formatter — serializes performance data to a JSON string.
 *
 * JSON has no literal for infinities or NaN, so non-finite numbers
 * (common in threshold ranges such as `10:`) are written as the strings
 * "inf", "-inf" and "NaN". Each record is enriched with its derived
 * `status` so consumers need not re-evaluate the thresholds.
 */

import type { MonitoringStatus } from "../types/status.js";
import type { UnitKind } from "../types/unit.js";
import type { ThresholdRange } from "../perf/threshold-range.js";
import type { Perfdata } from "../perf/perfdata.js";
import type { PerfdataSet } from "../perf/perfdata-set.js";
import type { FormatterOptions } from "./formatter.js";

export type JsonNumber = number | "inf" | "-inf" | "NaN";

export interface ThresholdRangeJson {
  readonly alertInside: boolean;
  readonly start: JsonNumber;
  readonly end: JsonNumber;
}

export interface PerfdataJson {
  readonly label: string;
  readonly unit: UnitKind;
  /** null when the value is undetermined. */
  readonly value: JsonNumber | null;
  readonly warn: ThresholdRangeJson | null;
  readonly crit: ThresholdRangeJson | null;
  readonly min: JsonNumber | null;
  readonly max: JsonNumber | null;
  readonly status: MonitoringStatus;
}

export interface PerfdataSetJson {
  readonly status: MonitoringStatus;
  readonly data: readonly PerfdataJson[];
}

export function toJsonNumber(value: number): JsonNumber {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  if (value === Infinity) {
    return "inf";
  }
  if (value === -Infinity) {
    return "-inf";
  }
  return value;
}

function optionalNumber(value: number | undefined): JsonNumber | null {
  return value === undefined ? null : toJsonNumber(value);
}

function toThresholdRangeJson(range: ThresholdRange | undefined): ThresholdRangeJson | null {
  if (range === undefined) {
    return null;
  }
  return {
    alertInside: range.alertInside,
    start: toJsonNumber(range.start),
    end: toJsonNumber(range.end),
  };
}

export function toPerfdataJson(perfdata: Perfdata): PerfdataJson {
  return {
    label: perfdata.label,
    unit: perfdata.unit.kind,
    value: optionalNumber(perfdata.value()),
    warn: toThresholdRangeJson(perfdata.warn),
    crit: toThresholdRangeJson(perfdata.crit),
    min: optionalNumber(perfdata.min),
    max: optionalNumber(perfdata.max),
    status: perfdata.status(),
  };
}

export function toPerfdataSetJson(set: PerfdataSet): PerfdataSetJson {
  return {
    status: set.status(),
    data: set.data().map(toPerfdataJson),
  };
}

/**
 * Formats a PerfdataSet as a JSON document, pretty-printed unless
 * `options.pretty` is false. Key order is fixed, so identical input
 * gives identical output.
 */
export function formatJson(set: PerfdataSet, options?: FormatterOptions): string {
  const indent = options?.pretty === false ? undefined : 2;
  return JSON.stringify(toPerfdataSetJson(set), null, indent);
}

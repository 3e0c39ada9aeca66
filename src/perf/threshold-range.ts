/**
 * Threshold ranges.
 *
 * A range is an inclusive interval plus a polarity: an "outside" range
 * alerts for values that fall outside the interval, an "inside" range
 * (written with a leading `@`) alerts for values within it.
 *
 *   10      < 0 or > 10       outside {0 .. 10}
 *   10:     < 10              outside {10 .. ∞}
 *   ~:10    > 10              outside {-∞ .. 10}
 *   10:20   < 10 or > 20      outside {10 .. 20}
 *   @10:20  ≥ 10 and ≤ 20     inside {10 .. 20}
 */

import { formatNumber } from "./number.js";

export class ThresholdRange {
  readonly alertInside: boolean;
  readonly start: number;
  readonly end: number;

  /**
   * Bounds given in the wrong order are swapped rather than rejected.
   */
  private constructor(alertInside: boolean, start: number, end: number) {
    this.alertInside = alertInside;
    if (end < start) {
      this.start = end;
      this.end = start;
    } else {
      this.start = start;
      this.end = end;
    }
  }

  /** Alert when the value is not within `[start, end]`. */
  static outside(start: number, end: number): ThresholdRange {
    return new ThresholdRange(false, start, end);
  }

  /** Alert when the value is within `[start, end]`. */
  static inside(start: number, end: number): ThresholdRange {
    return new ThresholdRange(true, start, end);
  }

  /** Alert below zero or above `limit`. */
  static abovePos(limit: number): ThresholdRange {
    return ThresholdRange.outside(0, limit);
  }

  /** Alert below `limit`. */
  static below(limit: number): ThresholdRange {
    return ThresholdRange.outside(limit, Infinity);
  }

  /** Alert above `limit`. */
  static above(limit: number): ThresholdRange {
    return ThresholdRange.outside(-Infinity, limit);
  }

  /**
   * Both bounds count as inside the interval.
   */
  isAlert(value: number): boolean {
    const isInside = this.start <= value && value <= this.end;
    return this.alertInside ? isInside : !isInside;
  }

  equals(other: ThresholdRange): boolean {
    return (
      this.alertInside === other.alertInside &&
      this.start === other.start &&
      this.end === other.end
    );
  }

  /**
   * Canonical range notation, using the shortest form the grammar
   * offers for the bounds.
   */
  toString(): string {
    const prefix = this.alertInside ? "@" : "";
    return prefix + this.formatBounds();
  }

  private formatBounds(): string {
    const { start, end } = this;
    if (start === -Infinity && end === Infinity) {
      return "~:";
    }
    if (start === 0 && end === Infinity) {
      return "0:";
    }
    if (start === 0) {
      return formatNumber(end);
    }
    if (start === -Infinity) {
      return `~:${formatNumber(end)}`;
    }
    if (end === Infinity) {
      return `${formatNumber(start)}:`;
    }
    return `${formatNumber(start)}:${formatNumber(end)}`;
  }
}

/**
 * An ordered collection of Perfdata, as reported together by one check.
 *
 * Insertion order is preserved and records sharing a label are kept
 * side by side.
 */

import type { MonitoringStatus } from "../types/status.js";
import type { Perfdata } from "./perfdata.js";

export class PerfdataSet implements Iterable<Perfdata> {
  private readonly entries: Perfdata[];

  constructor(data: Iterable<Perfdata> = []) {
    this.entries = [...data];
  }

  static from(data: Iterable<Perfdata>): PerfdataSet {
    return new PerfdataSet(data);
  }

  add(perfdata: Perfdata): void {
    this.entries.push(perfdata);
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get size(): number {
    return this.entries.length;
  }

  data(): readonly Perfdata[] {
    return this.entries;
  }

  [Symbol.iterator](): Iterator<Perfdata> {
    return this.entries[Symbol.iterator]();
  }

  critical(): readonly Perfdata[] {
    return this.entries.filter((pd) => pd.isCrit());
  }

  warning(): readonly Perfdata[] {
    return this.entries.filter((pd) => pd.isWarn());
  }

  hasCritical(): boolean {
    return this.entries.some((pd) => pd.isCrit());
  }

  hasWarning(): boolean {
    return this.entries.some((pd) => pd.isWarn());
  }

  /** True when any record is in warning or critical. */
  isDegraded(): boolean {
    return this.entries.some((pd) => pd.isWarn() || pd.isCrit());
  }

  status(): MonitoringStatus {
    if (this.hasCritical()) {
      return "Critical";
    }
    if (this.hasWarning()) {
      return "Warning";
    }
    return "OK";
  }

  /** Canonical tokens separated by single spaces. */
  toString(): string {
    return this.entries.map((pd) => pd.toString()).join(" ");
  }
}

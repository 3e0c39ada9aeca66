/**
 * Formatter interface for turning a PerfdataSet into an output string.
 *
 * Each output format (canonical text, JSON) is implemented as a function
 * conforming to this type. Formatters depend only on the Types and
 * Model layers.
 */

import type { PerfdataSet } from "../perf/perfdata-set.js";

/**
 * Options that control formatter output behavior.
 */
export interface FormatterOptions {
  /** Indent structured output for reading. Defaults to true. */
  readonly pretty?: boolean;
}

/**
 * A Formatter takes a PerfdataSet and produces a formatted string.
 */
export type Formatter = (set: PerfdataSet, options?: FormatterOptions) => string;

/**
 * Text formatter: the canonical performance-data notation that check
 * plugins print after the `|` of their output line.
 */

import type { PerfdataSet } from "../perf/perfdata-set.js";
import type { FormatterOptions } from "./formatter.js";

/**
 * Tokens joined by single spaces; an empty set formats to "".
 * The text notation has a single layout, so options are ignored.
 */
export function formatText(set: PerfdataSet, _options?: FormatterOptions): string {
  return set.toString();
}

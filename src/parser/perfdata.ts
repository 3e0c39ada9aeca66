/**
 * Single-token performance data parser.
 *
 * Expected format (Nagios plugin guidelines):
 *
 *   'label'=value[UOM];[warn];[crit];[min];[max]
 *
 *   - the label can contain any character except `=` and `'`; the
 *     surrounding quotes are only required when it contains spaces
 *   - value, min and max are numbers; value may be the literal `U` when
 *     the check could not determine it
 *   - warn and crit use the threshold range format
 *   - empty and trailing segments may be dropped
 *   - UOM is one of: none, `s`, `%`, `b`, `c`
 */

import type { PerfdataParseError } from "../types/error.js";
import {
  invalidNumber,
  labelContainsSingleQuote,
  missingEqualsSign,
  missingLabel,
  missingValue,
  unknownUnit,
} from "../types/error.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { unitFromSuffix } from "../types/unit.js";
import type { UnitValue } from "../types/unit.js";
import { Perfdata } from "../perf/perfdata.js";
import { parseNumber } from "./number.js";
import { parseThresholdRange } from "./threshold.js";

const LABEL_DELIMITER = "=";
const DATA_DELIMITER = ";";
const QUOTE = "'";
const UNDETERMINED_VALUES: ReadonlySet<string> = new Set(["U", "u"]);
const NUMERIC_CHARS = /[0-9.-]/;

/** value, warn, crit, min, max */
const MAX_SEGMENTS = 5;

function parseLabel(region: string): Result<string, PerfdataParseError> {
  let label = region.trim();
  if (label.length >= 2 && label.startsWith(QUOTE) && label.endsWith(QUOTE)) {
    label = label.slice(1, -1);
  }
  if (label.includes(QUOTE)) {
    return err(labelContainsSingleQuote());
  }
  if (label.length === 0) {
    return err(missingLabel());
  }
  return ok(label);
}

/**
 * Splits e.g. "12.5ms" into its number and unit parts at the first
 * character that cannot belong to a number.
 */
function splitValueAndUnit(text: string): { readonly number: string; readonly unit: string } {
  let index = 0;
  while (index < text.length && NUMERIC_CHARS.test(text.charAt(index))) {
    index++;
  }
  return { number: text.slice(0, index), unit: text.slice(index) };
}

function parseValue(text: string): Result<UnitValue, PerfdataParseError> {
  if (UNDETERMINED_VALUES.has(text)) {
    return ok({ kind: "undetermined" });
  }

  const parts = splitValueAndUnit(text);
  const value = parseNumber(parts.number);
  if (!value.ok) {
    return err(invalidNumber(value.error));
  }
  // Digit runs past the double range read as Infinity.
  if (!Number.isFinite(value.value)) {
    return err(
      invalidNumber({ input: parts.number, message: `value "${parts.number}" is out of range` }),
    );
  }

  const kind = unitFromSuffix(parts.unit);
  if (kind === undefined) {
    return err(unknownUnit(parts.unit));
  }
  return ok({ kind, value: value.value });
}

function parseBound(text: string): Result<number, PerfdataParseError> {
  const parsed = parseNumber(text);
  return parsed.ok ? parsed : err(invalidNumber(parsed.error));
}

/**
 * Treats missing and empty segments alike.
 */
function segment(segments: readonly string[], index: number): string | undefined {
  const text = segments[index];
  return text === undefined || text.length === 0 ? undefined : text;
}

/**
 * Parse one `label=value;warn;crit;min;max` token.
 */
export function parsePerfdata(token: string): Result<Perfdata, PerfdataParseError> {
  // Labels cannot contain an equals sign, so the first one delimits the label.
  const delimiterIndex = token.indexOf(LABEL_DELIMITER);
  if (delimiterIndex === -1) {
    return err(missingEqualsSign());
  }

  const label = parseLabel(token.slice(0, delimiterIndex));
  if (!label.ok) {
    return label;
  }

  const segments = token
    .slice(delimiterIndex + LABEL_DELIMITER.length)
    .split(DATA_DELIMITER)
    .slice(0, MAX_SEGMENTS);

  const valueText = segment(segments, 0);
  if (valueText === undefined) {
    return err(missingValue());
  }
  const unit = parseValue(valueText);
  if (!unit.ok) {
    return unit;
  }

  let perfdata = Perfdata.of(label.value, unit.value);

  const warnText = segment(segments, 1);
  if (warnText !== undefined) {
    const warn = parseThresholdRange(warnText);
    if (!warn.ok) {
      return warn;
    }
    perfdata = perfdata.withWarn(warn.value);
  }

  const critText = segment(segments, 2);
  if (critText !== undefined) {
    const crit = parseThresholdRange(critText);
    if (!crit.ok) {
      return crit;
    }
    perfdata = perfdata.withCrit(crit.value);
  }

  const minText = segment(segments, 3);
  if (minText !== undefined) {
    const min = parseBound(minText);
    if (!min.ok) {
      return min;
    }
    perfdata = perfdata.withMin(min.value);
  }

  const maxText = segment(segments, 4);
  if (maxText !== undefined) {
    const max = parseBound(maxText);
    if (!max.ok) {
      return max;
    }
    perfdata = perfdata.withMax(max.value);
  }

  return ok(perfdata);
}

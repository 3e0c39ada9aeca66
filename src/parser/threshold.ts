/**
 * Threshold range parser.
 *
 * Grammar: `[@] [START] [: [END]]`, or a bare END without a colon.
 *   - `@` switches the range to alert inside the interval
 *   - START defaults to 0, `~` means negative infinity
 *   - END after a colon defaults to positive infinity
 *
 * Bounds given in reverse order are swapped, not rejected.
 */

import type { PerfdataParseError } from "../types/error.js";
import { invalidNumber, thresholdEmpty } from "../types/error.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { ThresholdRange } from "../perf/threshold-range.js";
import { parseNumber } from "./number.js";

const INSIDE_MARKER = "@";
const BOUND_SEPARATOR = ":";
const NEGATIVE_INFINITY = "~";

function parseBound(
  text: string,
  fallback: number,
): Result<number, PerfdataParseError> {
  if (text.length === 0) {
    return ok(fallback);
  }
  const parsed = parseNumber(text);
  return parsed.ok ? parsed : err(invalidNumber(parsed.error));
}

export function parseThresholdRange(
  text: string,
): Result<ThresholdRange, PerfdataParseError> {
  const alertInside = text.startsWith(INSIDE_MARKER);
  const body = alertInside ? text.slice(INSIDE_MARKER.length) : text;

  if (body.length === 0) {
    return err(thresholdEmpty());
  }

  const separatorIndex = body.indexOf(BOUND_SEPARATOR);
  let start: number;
  let end: number;

  if (separatorIndex === -1) {
    const parsedEnd = parseBound(body, 0);
    if (!parsedEnd.ok) {
      return parsedEnd;
    }
    start = 0;
    end = parsedEnd.value;
  } else {
    const startText = body.slice(0, separatorIndex);
    const endText = body.slice(separatorIndex + BOUND_SEPARATOR.length);

    if (startText === NEGATIVE_INFINITY) {
      start = -Infinity;
    } else {
      const parsedStart = parseBound(startText, 0);
      if (!parsedStart.ok) {
        return parsedStart;
      }
      start = parsedStart.value;
    }

    const parsedEnd = parseBound(endText, Infinity);
    if (!parsedEnd.ok) {
      return parsedEnd;
    }
    end = parsedEnd.value;
  }

  return ok(
    alertInside
      ? ThresholdRange.inside(start, end)
      : ThresholdRange.outside(start, end),
  );
}

/**
 * Strict float parsing shared by every numeric field.
 *
 * `Number()` is too lenient for the wire format: it reads "" and
 * whitespace as 0 and accepts hex literals. Only plain decimal text and
 * the inf/infinity/nan words are accepted here.
 */

import type { NumberParseError } from "../types/error.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

export function parseNumber(text: string): Result<number, NumberParseError> {
  if (text.length === 0) {
    return err({ input: text, message: "cannot parse float from empty string" });
  }

  if (DECIMAL.test(text)) {
    return ok(Number(text));
  }

  const special = SPECIAL.exec(text);
  if (special !== null) {
    const word = (special[2] ?? "").toLowerCase();
    if (word === "nan") {
      return ok(NaN);
    }
    return ok(special[1] === "-" ? -Infinity : Infinity);
  }

  return err({ input: text, message: `invalid float literal "${text}"` });
}

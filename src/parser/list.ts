/**
 * Performance data list parser.
 *
 * A check reports its perfdata as space-separated tokens, but a label
 * may itself contain spaces, so plain splitting on whitespace is not
 * enough. Labels cannot contain `=`, so the next `=` always ends a
 * label; the data after it is numbers and ranges only, so the next space
 * after that `=` ends the token.
 */

import type { PerfdataParseError } from "../types/error.js";
import type { Result } from "../types/result.js";
import { err, partitionResults } from "../types/result.js";
import type { Perfdata } from "../perf/perfdata.js";
import { PerfdataSet } from "../perf/perfdata-set.js";
import { parsePerfdata } from "./perfdata.js";

/**
 * A token that failed to parse, together with its text.
 */
export interface TokenParseFailure {
  readonly token: string;
  readonly error: PerfdataParseError;
}

export interface ParsedPerfdataSet {
  /** Every token that parsed, in input order. */
  readonly set: PerfdataSet;
  /** Every token that did not, in input order. */
  readonly failures: readonly TokenParseFailure[];
}

/**
 * Split raw perfdata text into its individual tokens.
 */
export function splitTokens(input: string): readonly string[] {
  const text = input.trim();
  const tokens: string[] = [];
  let position = 0;

  while (position < text.length) {
    const equalsIndex = text.indexOf("=", position);
    if (equalsIndex === -1) {
      const remainder = text.slice(position).trim();
      if (remainder.length > 0) {
        tokens.push(remainder);
      }
      break;
    }

    const spaceIndex = text.indexOf(" ", equalsIndex);
    if (spaceIndex === -1) {
      tokens.push(text.slice(position));
      break;
    }

    tokens.push(text.slice(position, spaceIndex));
    position = spaceIndex + 1;
  }

  return tokens;
}

/**
 * Parse every token of a perfdata string.
 *
 * Each token is parsed on its own: one malformed token yields an error
 * entry at its position and does not stop the tokens after it.
 */
export function parsePerfdataList(
  input: string,
): readonly Result<Perfdata, PerfdataParseError>[] {
  return splitTokens(input).map((token) => parsePerfdata(token));
}

/**
 * Parse a perfdata string into a set of the tokens that parsed, keeping
 * the failures alongside.
 */
export function parsePerfdataSet(input: string): ParsedPerfdataSet {
  const results = splitTokens(input).map(
    (token): Result<Perfdata, TokenParseFailure> => {
      const result = parsePerfdata(token);
      return result.ok ? result : err({ token, error: result.error });
    },
  );
  const { values, errors } = partitionResults(results);
  return { set: PerfdataSet.from(values), failures: errors };
}

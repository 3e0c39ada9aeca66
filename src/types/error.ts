/**
 * Parse error taxonomy.
 *
 * Parsing never throws on malformed input; every failure is one of the
 * variants below, returned through a Result.
 */

/**
 * A numeric field could not be read as a floating-point number.
 */
export interface NumberParseError {
  /** The text that failed to parse. */
  readonly input: string;
  readonly message: string;
}

export type PerfdataParseError =
  | { readonly kind: "missing-equals-sign"; readonly message: string }
  | { readonly kind: "missing-label"; readonly message: string }
  | { readonly kind: "label-contains-single-quote"; readonly message: string }
  | { readonly kind: "missing-value"; readonly message: string }
  | { readonly kind: "unknown-unit"; readonly unit: string; readonly message: string }
  | { readonly kind: "invalid-number"; readonly cause: NumberParseError; readonly message: string }
  | { readonly kind: "threshold-empty"; readonly message: string };

export type PerfdataParseErrorKind = PerfdataParseError["kind"];

export function missingEqualsSign(): PerfdataParseError {
  return {
    kind: "missing-equals-sign",
    message: "equals sign (=) must be used to separate the label from data",
  };
}

export function missingLabel(): PerfdataParseError {
  return { kind: "missing-label", message: "label is missing before the equals sign" };
}

export function labelContainsSingleQuote(): PerfdataParseError {
  return {
    kind: "label-contains-single-quote",
    message: "label must not contain a single quote (') other than the surrounding pair",
  };
}

export function missingValue(): PerfdataParseError {
  return { kind: "missing-value", message: "numerical value missing after equals sign" };
}

export function unknownUnit(unit: string): PerfdataParseError {
  return { kind: "unknown-unit", unit, message: `unknown unit of measurement "${unit}"` };
}

export function invalidNumber(cause: NumberParseError): PerfdataParseError {
  return {
    kind: "invalid-number",
    cause,
    message: `value is not a number: ${cause.message}`,
  };
}

export function thresholdEmpty(): PerfdataParseError {
  return { kind: "threshold-empty", message: "threshold range must not be empty" };
}

/**
 * Error returned when a JSON document cannot be decoded into performance data.
 */
export interface PerfdataJsonError {
  readonly message: string;
  readonly cause?: unknown;
}

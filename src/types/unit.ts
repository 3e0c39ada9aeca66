/**
 * Unit-tagged measurement values.
 *
 * A performance-data value is always one of a closed set of units.
 * "undetermined" is the literal `U` a check reports when it could not
 * obtain the value; it carries no number.
 */

export const MEASURED_UNITS = ["none", "percentage", "seconds", "bytes", "counter"] as const;

export type MeasuredUnit = (typeof MEASURED_UNITS)[number];

export type UnitKind = MeasuredUnit | "undetermined";

export type UnitValue =
  | { readonly kind: MeasuredUnit; readonly value: number }
  | { readonly kind: "undetermined" };

/** Suffix written after the number in the text notation. */
export const UNIT_SUFFIXES = {
  none: "",
  percentage: "%",
  seconds: "s",
  bytes: "b",
  counter: "c",
} as const satisfies Record<MeasuredUnit, string>;

const SUFFIX_TO_UNIT: ReadonlyMap<string, MeasuredUnit> = new Map(
  MEASURED_UNITS.map((unit): [string, MeasuredUnit] => [UNIT_SUFFIXES[unit], unit]),
);

/**
 * Resolves a unit suffix to its unit. Matching is exact: "S" and "ms"
 * are not recognized.
 */
export function unitFromSuffix(suffix: string): MeasuredUnit | undefined {
  return SUFFIX_TO_UNIT.get(suffix);
}

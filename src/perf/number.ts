/**
 * Number rendering for the performance-data text notation.
 *
 * The token grammar reads a value as the run of digits, `.` and `-`
 * before the unit suffix, so exponent notation ("1e-7") would be read
 * back as the number 1 with unit "e-7". Numbers are therefore always
 * written in plain positional notation.
 */

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Formats a number the way it appears in performance data.
 *
 * Infinities are written as "inf" and "-inf", NaN as "NaN"; all three
 * are accepted again by the float parser.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  if (value === Infinity) {
    return "inf";
  }
  if (value === -Infinity) {
    return "-inf";
  }

  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (match === null) {
    return text;
  }

  const sign = match[1] ?? "";
  const digits = (match[2] ?? "") + (match[3] ?? "");
  const pointPosition = (match[2] ?? "").length + Number(match[4]);

  if (pointPosition <= 0) {
    return `${sign}0.${"0".repeat(-pointPosition)}${digits}`;
  }
  if (pointPosition >= digits.length) {
    return `${sign}${digits}${"0".repeat(pointPosition - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointPosition)}.${digits.slice(pointPosition)}`;
}

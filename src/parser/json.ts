/**
 * JSON decoder — the inverse of the JSON formatter.
 *
 * The document is validated with zod before any record is built, so a
 * malformed document yields an error naming the offending path instead
 * of a half-built set. Derived `status` fields are accepted and ignored.
 */

import { z } from "zod";
import type { PerfdataJsonError } from "../types/error.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { MEASURED_UNITS } from "../types/unit.js";
import { ThresholdRange } from "../perf/threshold-range.js";
import { Perfdata } from "../perf/perfdata.js";
import { PerfdataSet } from "../perf/perfdata-set.js";

const jsonNumberSchema = z
  .union([z.number(), z.enum(["inf", "-inf", "NaN"])])
  .transform((value): number => {
    switch (value) {
      case "inf":
        return Infinity;
      case "-inf":
        return -Infinity;
      case "NaN":
        return NaN;
      default:
        return value;
    }
  });

const thresholdRangeSchema = z.object({
  alertInside: z.boolean(),
  start: jsonNumberSchema,
  end: jsonNumberSchema,
});

/** Absent fields are written as null; both spellings read as undefined. */
function absentAsUndefined<T>(value: T | null | undefined): T | undefined {
  return value === null ? undefined : value;
}

const labelSchema = z
  .string()
  .min(1, "label must not be empty")
  .refine((label) => !label.includes("'"), "label must not contain a single quote")
  .refine((label) => !label.includes("="), "label must not contain an equals sign");

const commonFields = {
  label: labelSchema,
  warn: thresholdRangeSchema.nullish().transform(absentAsUndefined),
  crit: thresholdRangeSchema.nullish().transform(absentAsUndefined),
  min: jsonNumberSchema.nullish().transform(absentAsUndefined),
  max: jsonNumberSchema.nullish().transform(absentAsUndefined),
};

const perfdataSchema = z.union([
  z.object({
    ...commonFields,
    unit: z.enum(MEASURED_UNITS),
    value: z.number().finite("value must be a finite number"),
  }),
  z.object({
    ...commonFields,
    unit: z.literal("undetermined"),
    value: z.null().optional(),
  }),
]);

const perfdataSetSchema = z.object({
  data: z.array(perfdataSchema),
});

type PerfdataInput = z.infer<typeof perfdataSchema>;
type ThresholdRangeInput = z.infer<typeof thresholdRangeSchema>;

function toRange(input: ThresholdRangeInput): ThresholdRange {
  return input.alertInside
    ? ThresholdRange.inside(input.start, input.end)
    : ThresholdRange.outside(input.start, input.end);
}

function toPerfdata(input: PerfdataInput): Perfdata {
  let perfdata =
    input.unit === "undetermined"
      ? Perfdata.undetermined(input.label)
      : Perfdata.of(input.label, { kind: input.unit, value: input.value });

  if (input.warn !== undefined) {
    perfdata = perfdata.withWarn(toRange(input.warn));
  }
  if (input.crit !== undefined) {
    perfdata = perfdata.withCrit(toRange(input.crit));
  }
  if (input.min !== undefined) {
    perfdata = perfdata.withMin(input.min);
  }
  if (input.max !== undefined) {
    perfdata = perfdata.withMax(input.max);
  }
  return perfdata;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Decode a JSON document produced by `formatJson` back into a PerfdataSet.
 */
export function parseJson(text: string): Result<PerfdataSet, PerfdataJsonError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (cause: unknown) {
    return err({ message: "Failed to parse perfdata JSON", cause });
  }

  const parsed = perfdataSetSchema.safeParse(raw);
  if (!parsed.success) {
    return err({
      message: `Invalid perfdata JSON: ${describeIssues(parsed.error)}`,
      cause: parsed.error,
    });
  }

  return ok(PerfdataSet.from(parsed.data.data.map(toPerfdata)));
}

/**
 * Tests for Perfdata records.
 *
 * Covers the unit constructors, the immutable builders, alert
 * evaluation and status, and the canonical token format.
 */

import { describe, it, expect } from "vitest";
import { Perfdata } from "./perfdata.js";
import { ThresholdRange } from "./threshold-range.js";

describe("constructors", () => {
  it("tags the value with its unit", () => {
    expect(Perfdata.unit("users", 3).unit).toEqual({ kind: "none", value: 3 });
    expect(Perfdata.percentage("disk", 50).unit).toEqual({ kind: "percentage", value: 50 });
    expect(Perfdata.seconds("rta", 0.25).unit).toEqual({ kind: "seconds", value: 0.25 });
    expect(Perfdata.bytes("rss", 2048).unit).toEqual({ kind: "bytes", value: 2048 });
    expect(Perfdata.counter("rx", 12345).unit).toEqual({ kind: "counter", value: 12345 });
    expect(Perfdata.undetermined("temp").unit).toEqual({ kind: "undetermined" });
  });

  it("keeps the label", () => {
    expect(Perfdata.unit("load 1", 0).label).toBe("load 1");
  });

  it("starts without thresholds or limits", () => {
    const perfdata = Perfdata.unit("users", 3);
    expect(perfdata.warn).toBeUndefined();
    expect(perfdata.crit).toBeUndefined();
    expect(perfdata.min).toBeUndefined();
    expect(perfdata.max).toBeUndefined();
    expect(perfdata.hasThresholdsOrLimits()).toBe(false);
  });

  it("of() builds a record from a tagged value", () => {
    const perfdata = Perfdata.of("disk", { kind: "percentage", value: 12 });
    expect(perfdata.equals(Perfdata.percentage("disk", 12))).toBe(true);
  });

  it("throws for an empty label", () => {
    expect(() => Perfdata.unit("", 1)).toThrow("must not be empty");
  });

  it("throws for a label containing a single quote", () => {
    expect(() => Perfdata.unit("it's", 1)).toThrow("single quote");
  });

  it("throws for a label containing an equals sign", () => {
    expect(() => Perfdata.undetermined("a=b")).toThrow("equals sign");
  });

  it.each([
    ["infinity", () => Perfdata.unit("x", Infinity)],
    ["negative infinity", () => Perfdata.seconds("y", -Infinity)],
    ["NaN", () => Perfdata.unit("z", NaN)],
    ["a non-finite tagged value", () => Perfdata.of("w", { kind: "bytes", value: Infinity })],
  ])("throws for %s as the measured value", (_name, build) => {
    expect(build).toThrow("must be a finite number");
  });

  it("accepts non-finite bounds", () => {
    const perfdata = Perfdata.unit("x", 1).withMin(-Infinity).withMax(NaN);
    expect(perfdata.min).toBe(-Infinity);
    expect(Number.isNaN(perfdata.max)).toBe(true);
  });
});

describe("value", () => {
  it("returns the number for measured units", () => {
    expect(Perfdata.seconds("rta", 1.5).value()).toBe(1.5);
    expect(Perfdata.unit("zero", 0).value()).toBe(0);
  });

  it("returns undefined for an undetermined value", () => {
    expect(Perfdata.undetermined("temp").value()).toBeUndefined();
  });
});

describe("builders", () => {
  it("return a new record and leave the original unchanged", () => {
    const original = Perfdata.unit("users", 3);
    const updated = original
      .withWarn(ThresholdRange.abovePos(5))
      .withCrit(ThresholdRange.abovePos(10))
      .withMin(0)
      .withMax(100);

    expect(updated).not.toBe(original);
    expect(original.hasThresholdsOrLimits()).toBe(false);
    expect(updated.warn?.equals(ThresholdRange.abovePos(5))).toBe(true);
    expect(updated.crit?.equals(ThresholdRange.abovePos(10))).toBe(true);
    expect(updated.min).toBe(0);
    expect(updated.max).toBe(100);
    expect(updated.label).toBe("users");
  });

  it("replace a previously set field", () => {
    const perfdata = Perfdata.unit("users", 3).withMax(10).withMax(20);
    expect(perfdata.max).toBe(20);
  });
});

describe("isWarn / isCrit", () => {
  const warn = ThresholdRange.abovePos(5);
  const crit = ThresholdRange.abovePos(15);

  it("is in warning but not critical between the limits", () => {
    const perfdata = Perfdata.unit("procs", 10).withWarn(warn).withCrit(crit);
    expect(perfdata.isWarn()).toBe(true);
    expect(perfdata.isCrit()).toBe(false);
  });

  it("is in both above the critical limit", () => {
    const perfdata = Perfdata.unit("procs", 20).withWarn(warn).withCrit(crit);
    expect(perfdata.isWarn()).toBe(true);
    expect(perfdata.isCrit()).toBe(true);
  });

  it("never alerts without thresholds", () => {
    const perfdata = Perfdata.unit("procs", 30);
    expect(perfdata.isWarn()).toBe(false);
    expect(perfdata.isCrit()).toBe(false);
  });

  it("never alerts for an undetermined value", () => {
    const perfdata = Perfdata.undetermined("procs")
      .withWarn(ThresholdRange.abovePos(20))
      .withCrit(ThresholdRange.abovePos(20));
    expect(perfdata.isWarn()).toBe(false);
    expect(perfdata.isCrit()).toBe(false);
  });
});

describe("status", () => {
  it("is OK when no range alerts", () => {
    expect(Perfdata.unit("procs", 1).withWarn(ThresholdRange.abovePos(5)).status()).toBe("OK");
  });

  it("is Warning when only the warning range alerts", () => {
    const perfdata = Perfdata.unit("procs", 50)
      .withWarn(ThresholdRange.abovePos(5))
      .withCrit(ThresholdRange.abovePos(100));
    expect(perfdata.status()).toBe("Warning");
  });

  it("is Critical when the critical range alerts", () => {
    const perfdata = Perfdata.unit("procs", 150)
      .withWarn(ThresholdRange.abovePos(5))
      .withCrit(ThresholdRange.abovePos(100));
    expect(perfdata.status()).toBe("Critical");
  });

  it("checks critical first even when the ranges are not nested", () => {
    const perfdata = Perfdata.unit("temp", 5)
      .withWarn(ThresholdRange.abovePos(1))
      .withCrit(ThresholdRange.inside(0, 10));
    expect(perfdata.status()).toBe("Critical");
  });

  it("is OK for an undetermined value", () => {
    const perfdata = Perfdata.undetermined("temp").withCrit(ThresholdRange.abovePos(0));
    expect(perfdata.status()).toBe("OK");
  });
});

describe("equals", () => {
  it("compares label, unit, value and every optional field", () => {
    const base = Perfdata.bytes("rss", 10).withWarn(ThresholdRange.abovePos(20)).withMin(0);

    expect(base.equals(Perfdata.bytes("rss", 10).withWarn(ThresholdRange.abovePos(20)).withMin(0))).toBe(true);
    expect(base.equals(Perfdata.unit("rss", 10).withWarn(ThresholdRange.abovePos(20)).withMin(0))).toBe(false);
    expect(base.equals(Perfdata.bytes("rss", 11).withWarn(ThresholdRange.abovePos(20)).withMin(0))).toBe(false);
    expect(base.equals(Perfdata.bytes("vsz", 10).withWarn(ThresholdRange.abovePos(20)).withMin(0))).toBe(false);
    expect(base.equals(Perfdata.bytes("rss", 10).withWarn(ThresholdRange.abovePos(20)))).toBe(false);
    expect(base.equals(Perfdata.bytes("rss", 10).withMin(0))).toBe(false);
  });

  it("treats two undetermined records with the same label as equal", () => {
    expect(Perfdata.undetermined("temp").equals(Perfdata.undetermined("temp"))).toBe(true);
  });
});

describe("toString", () => {
  it("writes each unit with its suffix", () => {
    expect(Perfdata.unit("unit", 0).toString()).toBe("'unit'=0;");
    expect(Perfdata.percentage("percentage", 50).toString()).toBe("'percentage'=50%;");
    expect(Perfdata.seconds("seconds", 1.234).toString()).toBe("'seconds'=1.234s;");
    expect(Perfdata.bytes("bytes", 0.0001).toString()).toBe("'bytes'=0.0001b;");
    expect(Perfdata.counter("counter", 12345).toString()).toBe("'counter'=12345c;");
    expect(Perfdata.undetermined("undetermined").toString()).toBe("'undetermined'=U;");
  });

  it("writes empty segments for fields that are not set", () => {
    const base = Perfdata.unit("label", 10);
    expect(base.withWarn(ThresholdRange.abovePos(20)).toString()).toBe("'label'=10;20;;;;");
    expect(base.withCrit(ThresholdRange.abovePos(30)).toString()).toBe("'label'=10;;30;;;");
    expect(base.withMin(0).toString()).toBe("'label'=10;;;0;;");
    expect(base.withMax(100).toString()).toBe("'label'=10;;;;100;");
  });

  it("writes all four fields when set", () => {
    const perfdata = Perfdata.percentage("percentage", 50)
      .withWarn(ThresholdRange.abovePos(20))
      .withCrit(ThresholdRange.abovePos(30))
      .withMin(-50)
      .withMax(50);
    expect(perfdata.toString()).toBe("'percentage'=50%;20;30;-50;50;");
  });

  it("keeps thresholds and limits on an undetermined value", () => {
    const perfdata = Perfdata.undetermined("undetermined")
      .withWarn(ThresholdRange.abovePos(20))
      .withCrit(ThresholdRange.abovePos(30))
      .withMin(-50)
      .withMax(50);
    expect(perfdata.toString()).toBe("'undetermined'=U;20;30;-50;50;");
  });

  it("quotes labels containing spaces", () => {
    expect(Perfdata.seconds("response time", 0.5).toString()).toBe("'response time'=0.5s;");
  });

  it("writes tiny values without exponent notation", () => {
    expect(Perfdata.seconds("latency", 1e-7).toString()).toBe("'latency'=0.0000001s;");
  });
});

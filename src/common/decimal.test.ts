import { describe, expect, it } from "vitest";
import { ExactDecimal } from "./decimal";

describe("ExactDecimal", () => {
  it("reads doubles through their shortest decimal form", () => {
    expect(ExactDecimal.fromNumber(0.1).toString()).toBe("0.1");
    expect(ExactDecimal.fromNumber(0.58).toString()).toBe("0.58");
    expect(ExactDecimal.fromNumber(1).toString()).toBe("1");
    expect(ExactDecimal.fromNumber(0).toString()).toBe("0");
  });

  it("handles exponent notation", () => {
    const tiny = ExactDecimal.fromNumber(1e-7);
    expect(tiny.units).toBe(1n);
    expect(tiny.scale).toBe(7);
    expect(tiny.toString()).toBe("0.0000001");
    expect(ExactDecimal.fromNumber(2.5e-10).toString()).toBe("0.00000000025");
  });

  it("keeps the sign of negative values", () => {
    expect(ExactDecimal.fromNumber(-0.01).toString()).toBe("-0.01");
  });

  it("adds tenths to exactly one where doubles drift", () => {
    let doubleSum = 0;
    let exactSum = ExactDecimal.ZERO;
    for (let i = 0; i < 10; i++) {
      doubleSum += 0.1;
      exactSum = exactSum.plus(ExactDecimal.fromNumber(0.1));
    }

    expect(doubleSum).not.toBe(1);
    expect(exactSum.equals(ExactDecimal.ONE)).toBe(true);
    expect(exactSum.toString()).toBe("1");
  });

  it("aligns scales when adding", () => {
    const sum = ExactDecimal.fromNumber(0.31).plus(ExactDecimal.fromNumber(0.58));
    expect(sum.toString()).toBe("0.89");
    expect(sum.toNumber()).toBe(0.89);
  });

  it("compares values of different scales", () => {
    const a = ExactDecimal.fromNumber(0.3);
    const b = ExactDecimal.fromNumber(0.25);

    expect(a.compare(b)).toBe(1);
    expect(b.compare(a)).toBe(-1);
    expect(a.compare(ExactDecimal.fromNumber(0.3))).toBe(0);
    expect(ExactDecimal.fromNumber(0.99).plus(ExactDecimal.fromNumber(0.02)).compare(ExactDecimal.ONE)).toBe(1);
  });

  it("rejects non-finite input", () => {
    expect(() => ExactDecimal.fromNumber(Number.NaN)).toThrow(RangeError);
    expect(() => ExactDecimal.fromNumber(Infinity)).toThrow(RangeError);
  });
});

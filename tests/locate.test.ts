import { describe, expect, it } from "vitest";
import { locate } from "../src/index";

describe("locate", () => {
  const table = [0.1, 0.3, 1.0];

  it("puts a roll on a boundary into the next bucket", () => {
    expect(locate(table, 0.1)).toBe(1);
    expect(locate(table, 0.3)).toBe(2);
  });

  it("keeps a roll just below a boundary in the current bucket", () => {
    expect(locate(table, 0.09999999999999999)).toBe(0);
    expect(locate(table, 0.29999999999999993)).toBe(1);
  });

  it("maps the extremes of [0, 1) onto the first and last buckets", () => {
    expect(locate(table, 0.0)).toBe(0);
    expect(locate(table, 0.9999999999999999)).toBe(2);
  });

  it("skips leading zero-probability buckets", () => {
    expect(locate([0, 0, 0.5, 1], 0)).toBe(2);
  });

  it("never lands on trailing zero-probability buckets", () => {
    expect(locate([0.5, 1, 1], 0.9999999999999999)).toBe(1);
  });

  it("searches large tables", () => {
    const n = 100000;
    const big = Array.from({ length: n }, (_, i) => (i + 1) / n);

    expect(locate(big, 0)).toBe(0);
    expect(locate(big, 0.5)).toBe(50000);
    expect(locate(big, 0.9999999999999999)).toBe(n - 1);
  });

  it("throws rather than returning an index past the table", () => {
    expect(() => locate(table, 1)).toThrow(RangeError);
    expect(() => locate([0.2, 0.5], 0.7)).toThrow(
      "locate: roll 0.7 falls outside a cumulative table of 2 entries"
    );
    expect(() => locate([], 0)).toThrow(RangeError);
  });
});

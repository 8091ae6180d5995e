import { describe, expect, it } from "vitest";
import { SeededRandom } from "./random";

const draw = (random: SeededRandom, n: number) =>
  Array.from({ length: n }, () => random.next());

describe("SeededRandom", () => {
  it("emits values in [0, 1)", () => {
    const random = new SeededRandom("range");
    for (const value of draw(random, 10000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("repeats the sequence for the same seed", () => {
    expect(draw(new SeededRandom(10), 50)).toEqual(draw(new SeededRandom(10), 50));
  });

  it("treats numeric and string seeds alike", () => {
    expect(draw(new SeededRandom(42), 20)).toEqual(draw(new SeededRandom("42"), 20));
  });

  it("restarts the sequence when reseeded", () => {
    const random = new SeededRandom("first");
    const before = draw(random, 25);
    random.seed("first");
    expect(draw(random, 25)).toEqual(before);
  });

  it("diverges for different seeds", () => {
    expect(draw(new SeededRandom(10), 100)).not.toEqual(draw(new SeededRandom(11), 100));
  });
});

import { ExactDecimal } from "./common/decimal";
import { sharedRandom } from "./common/random";
import type { RandomSource } from "./common/random";
import { SamplerError } from "./errors";
import { locate } from "./locate";
import type { SamplerOptions, Tally } from "./types";

/**
 * Draws integer outcomes according to a fixed discrete distribution.
 *
 * Inputs are validated once, in this order, and the first failure is thrown:
 * - outcome and probability counts match (`LengthMismatch`)
 * - every probability is a finite number (`InvalidProbabilityType`) in
 *   [0, 1] (`InvalidProbability`)
 * - every outcome is an integer (`InvalidOutcomeType`)
 * - the probabilities add up to exactly 1 in decimal (`ProbabilitySumError`)
 *
 * The cumulative table is built with exact decimal sums; each `next()` maps a
 * uniform roll onto it with an upper-bound search.
 *
 * Example:
 *   const sampler = new WeightedSampler([-1, 0, 1], [0.2, 0.5, 0.3]);
 *   sampler.next(); // -1, 0 or 1
 */
export class WeightedSampler {
  private readonly _outcomes: readonly number[];
  private readonly _probabilities: readonly ExactDecimal[];
  private readonly _cumulative: readonly ExactDecimal[];
  // Doubles nearest to each exact cumulative value, searched by next().
  private readonly bounds: readonly number[];
  private readonly random: RandomSource;

  constructor(
    outcomes: readonly number[],
    probabilities: readonly number[],
    options: SamplerOptions = {}
  ) {
    if (outcomes.length !== probabilities.length) {
      throw new SamplerError(
        "LengthMismatch",
        `Expected one probability per outcome, got ${outcomes.length} outcomes and ${probabilities.length} probabilities`
      );
    }

    probabilities.forEach((p, i) => {
      if (typeof p !== "number" || !Number.isFinite(p)) {
        throw new SamplerError(
          "InvalidProbabilityType",
          `Probability at index ${i} must be a finite number, got ${describe(p)}`,
          i
        );
      }
      if (p < 0 || p > 1) {
        throw new SamplerError(
          "InvalidProbability",
          `Probability at index ${i} must be within [0, 1], got ${p}`,
          i
        );
      }
    });

    outcomes.forEach((outcome, i) => {
      if (!Number.isInteger(outcome)) {
        throw new SamplerError(
          "InvalidOutcomeType",
          `Outcome at index ${i} must be an integer, got ${describe(outcome)}`,
          i
        );
      }
    });

    const exact = probabilities.map((p) => ExactDecimal.fromNumber(p));
    const cumulative: ExactDecimal[] = [];
    let running = ExactDecimal.ZERO;
    for (const p of exact) {
      running = running.plus(p);
      cumulative.push(running);
    }
    if (!running.equals(ExactDecimal.ONE)) {
      throw new SamplerError(
        "ProbabilitySumError",
        `Probabilities must sum to exactly 1, got ${running.toString()}`
      );
    }

    this._outcomes = Object.freeze([...outcomes]);
    this._probabilities = Object.freeze(exact);
    this._cumulative = Object.freeze(cumulative);
    this.bounds = Object.freeze(cumulative.map((c) => c.toNumber()));
    this.random = options.random ?? sharedRandom;
  }

  get size(): number {
    return this._outcomes.length;
  }

  get outcomes(): number[] {
    return [...this._outcomes];
  }

  /** Probabilities as exact decimal strings, e.g. "0.3". */
  get probabilities(): string[] {
    return this._probabilities.map((p) => p.toString());
  }

  get cumulative(): number[] {
    return [...this.bounds];
  }

  get cumulativeDecimals(): string[] {
    return this._cumulative.map((c) => c.toString());
  }

  next(): number {
    const index = locate(this.bounds, this.random.next());
    return this._outcomes[index];
  }

  take(count: number): number[] {
    assertCount("take", count);
    const out: number[] = [];
    for (let i = 0; i < count; i++) out.push(this.next());
    return out;
  }

  /**
   * Counts how often each outcome comes up over `draws` draws. Every distinct
   * outcome has an entry, zero when it never came up.
   */
  tally(draws: number): Tally {
    assertCount("tally", draws);
    const counts: Tally = new Map();
    for (const outcome of this._outcomes) counts.set(outcome, 0);
    for (let i = 0; i < draws; i++) {
      const outcome = this.next();
      counts.set(outcome, (counts.get(outcome) ?? 0) + 1);
    }
    return counts;
  }
}

function assertCount(method: string, n: number) {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`${method}(n): n must be a non-negative integer`);
  }
}

function describe(value: unknown): string {
  return typeof value === "string" ? `"${value}"` : String(value);
}

import seedrandom from "seedrandom";

/** Source of uniform draws in [0, 1). */
export interface RandomSource {
  next(): number;
}

export type Seed = string | number;

/**
 * Seedable uniform generator backed by seedrandom's ARC4 stream.
 *
 * Without a seed the generator auto-seeds from system entropy. Reseeding with
 * the same value restarts the same sequence.
 */
export class SeededRandom implements RandomSource {
  private rng: seedrandom.PRNG;

  constructor(seed?: Seed) {
    this.rng = SeededRandom.create(seed);
  }

  seed(seed?: Seed): void {
    this.rng = SeededRandom.create(seed);
  }

  next(): number {
    return this.rng();
  }

  private static create(seed?: Seed): seedrandom.PRNG {
    return seed === undefined ? seedrandom() : seedrandom(String(seed));
  }
}

/** Process-wide source used by samplers that are not given one. */
export const sharedRandom = new SeededRandom();

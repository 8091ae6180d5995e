import type { RandomSource } from "./common/random";

/** Options accepted by the `WeightedSampler` constructor. */
export interface SamplerOptions {
  /** Uniform source for draws. Defaults to the process-wide `sharedRandom`. */
  random?: RandomSource;
}

/** Outcome counts keyed by outcome value, in first-seen order. */
export type Tally = Map<number, number>;

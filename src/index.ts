export { WeightedSampler } from "./sampler";
export { locate } from "./locate";
export { SamplerError, isSamplerError } from "./errors";
export type { SamplerErrorKind } from "./errors";
export { ExactDecimal } from "./common/decimal";
export { SeededRandom, sharedRandom } from "./common/random";
export type { RandomSource, Seed } from "./common/random";
export type { SamplerOptions, Tally } from "./types";

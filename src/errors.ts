/** Ways a sampler definition can be rejected at construction. */
export type SamplerErrorKind =
  | "LengthMismatch"
  | "InvalidOutcomeType"
  | "InvalidProbabilityType"
  | "InvalidProbability"
  | "ProbabilitySumError";

/**
 * Thrown by the `WeightedSampler` constructor. `index` points at the offending
 * element when the failure concerns a single outcome or probability.
 */
export class SamplerError extends Error {
  constructor(
    public readonly kind: SamplerErrorKind,
    message: string,
    public readonly index?: number
  ) {
    super(message);
    this.name = "SamplerError";
  }
}

export function isSamplerError(
  value: unknown,
  kind?: SamplerErrorKind
): value is SamplerError {
  if (!(value instanceof SamplerError)) return false;
  return kind === undefined || value.kind === kind;
}

// Exact base-10 arithmetic for probability bookkeeping.

const NUMBER_FORMAT = /^(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/;

const pow10 = (n: number): bigint => 10n ** BigInt(n);

/**
 * Immutable fixed-point decimal: the value is `units / 10^scale`.
 *
 * Doubles are read through their shortest round-trip representation, so
 * `ExactDecimal.fromNumber(0.1)` is exactly one tenth and ten of them add up
 * to exactly one.
 */
export class ExactDecimal {
  static readonly ZERO = new ExactDecimal(0n, 0);
  static readonly ONE = new ExactDecimal(1n, 0);

  private constructor(
    public readonly units: bigint,
    public readonly scale: number
  ) {}

  static fromNumber(value: number): ExactDecimal {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot represent ${value} as a decimal`);
    }
    const negative = value < 0;
    const match = NUMBER_FORMAT.exec(String(Math.abs(value)));
    if (!match) {
      throw new RangeError(`Cannot represent ${value} as a decimal`);
    }
    const [, whole, fraction = "", exponent = "0"] = match;
    let units = BigInt(whole + fraction);
    let scale = fraction.length - Number(exponent);
    if (scale < 0) {
      units *= pow10(-scale);
      scale = 0;
    }
    return new ExactDecimal(negative ? -units : units, scale);
  }

  plus(other: ExactDecimal): ExactDecimal {
    const scale = Math.max(this.scale, other.scale);
    return new ExactDecimal(this.rescale(scale) + other.rescale(scale), scale);
  }

  compare(other: ExactDecimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const left = this.rescale(scale);
    const right = other.rescale(scale);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  }

  equals(other: ExactDecimal): boolean {
    return this.compare(other) === 0;
  }

  /** Plain decimal notation with trailing fractional zeros removed. */
  toString(): string {
    const negative = this.units < 0n;
    const digits = (negative ? -this.units : this.units)
      .toString()
      .padStart(this.scale + 1, "0");
    const whole = digits.slice(0, digits.length - this.scale);
    const fraction = digits.slice(digits.length - this.scale).replace(/0+$/, "");
    const body = fraction ? `${whole}.${fraction}` : whole;
    return negative && body !== "0" ? `-${body}` : body;
  }

  /** Nearest double to the exact value. */
  toNumber(): number {
    return Number(this.toString());
  }

  private rescale(scale: number): bigint {
    return this.units * pow10(scale - this.scale);
  }
}

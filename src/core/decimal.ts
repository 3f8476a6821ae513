/**
 * Exact fixed-point decimal values.
 *
 * A value is an integer number of units at a given scale
 * (`units / 10^scale`), so sums, products and tolerance comparisons on
 * monetary columns never go through binary floating point.
 */

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Exponents beyond this are rejected rather than expanded. */
const MAX_EXPONENT = 64;

function pow10(exp: number): bigint {
  return 10n ** BigInt(exp);
}

function absBig(n: bigint): bigint {
  return n < 0n ? -n : n;
}

export class Decimal {
  readonly units: bigint;
  readonly scale: number;

  constructor(units: bigint, scale: number) {
    if (!Number.isInteger(scale) || scale < 0) {
      throw new RangeError(`Invalid decimal scale: ${scale}`);
    }
    this.units = units;
    this.scale = scale;
  }

  /** Parse a decimal string or finite number, or return null if it is not one. */
  static tryParse(input: string | number): Decimal | null {
    let text: string;
    if (typeof input === "number") {
      if (!Number.isFinite(input)) return null;
      text = String(input);
    } else {
      text = input.trim();
    }

    const match = DECIMAL_PATTERN.exec(text);
    if (!match) return null;
    const [, sign, intPart = "", fracPart = "", expPart] = match;
    if (intPart.length === 0 && fracPart.length === 0) return null;
    const exponent = expPart ? Number(expPart) : 0;
    if (Math.abs(exponent) > MAX_EXPONENT) return null;

    let units = BigInt(`${intPart}${fracPart}` || "0");
    let scale = fracPart.length - exponent;
    if (scale < 0) {
      units *= pow10(-scale);
      scale = 0;
    }
    return new Decimal(sign === "-" ? -units : units, scale);
  }

  static parse(input: string | number): Decimal {
    const value = Decimal.tryParse(input);
    if (value === null) {
      throw new SyntaxError(`Not a decimal value: ${String(input)}`);
    }
    return value;
  }

  static zero(scale = 0): Decimal {
    return new Decimal(0n, scale);
  }

  /** Re-express at a larger scale without changing the value. */
  private widen(scale: number): bigint {
    return this.units * pow10(scale - this.scale);
  }

  add(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.widen(scale) + other.widen(scale), scale);
  }

  sub(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.widen(scale) - other.widen(scale), scale);
  }

  mul(other: Decimal): Decimal {
    return new Decimal(this.units * other.units, this.scale + other.scale);
  }

  abs(): Decimal {
    return new Decimal(absBig(this.units), this.scale);
  }

  compare(other: Decimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const a = this.widen(scale);
    const b = other.widen(scale);
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  /** True when the value has no fractional part. */
  isInteger(): boolean {
    return this.units % pow10(this.scale) === 0n;
  }

  /** Number of digits left of the decimal point (0 for |value| < 1). */
  integerDigits(): number {
    const whole = absBig(this.units) / pow10(this.scale);
    return whole === 0n ? 0 : whole.toString().length;
  }

  /** Round half away from zero to `scale` fractional digits. */
  round(scale: number): Decimal {
    if (scale >= this.scale) {
      return new Decimal(this.widen(scale), scale);
    }
    const divisor = pow10(this.scale - scale);
    const magnitude = absBig(this.units);
    let quotient = magnitude / divisor;
    if ((magnitude % divisor) * 2n >= divisor) quotient += 1n;
    return new Decimal(this.units < 0n ? -quotient : quotient, scale);
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    const digits = absBig(this.units).toString().padStart(this.scale + 1, "0");
    const sign = this.units < 0n ? "-" : "";
    if (this.scale === 0) return `${sign}${digits}`;
    const cut = digits.length - this.scale;
    return `${sign}${digits.slice(0, cut)}.${digits.slice(cut)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

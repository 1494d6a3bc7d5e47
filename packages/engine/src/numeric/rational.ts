// ─── Rational ──────────────────────────────────────────────────────
// Exact fractions over bigint. Always kept in lowest terms with a
// positive denominator, so field-wise equality is value equality.

function absBig(x: bigint): bigint {
  return x < 0n ? -x : x;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = absBig(a);
  let y = absBig(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

function bitLength(x: bigint): number {
  return x === 0n ? 0 : absBig(x).toString(2).length;
}

// Past this many bits Number(bigint) overflows to Infinity, so the
// quotient is taken in bigint first.
const MAX_FLOAT_BITS = 1000;
const QUOTIENT_BITS = 64;

/** x · 2^exponent, stepping so no intermediate power of two overflows. */
function scaleByPowerOfTwo(x: number, exponent: number): number {
  let result = x;
  let remaining = exponent;
  while (remaining > MAX_FLOAT_BITS) {
    result *= 2 ** MAX_FLOAT_BITS;
    remaining -= MAX_FLOAT_BITS;
  }
  while (remaining < -MAX_FLOAT_BITS) {
    result *= 2 ** -MAX_FLOAT_BITS;
    remaining += MAX_FLOAT_BITS;
  }
  return result * 2 ** remaining;
}

/**
 * An immutable arbitrary-precision fraction.
 * Every operation returns a new Rational; instances are never mutated.
 */
export class Rational {
  readonly numerator: bigint;
  readonly denominator: bigint;

  /** @throws {RangeError} if the denominator is zero. */
  constructor(numerator: bigint, denominator: bigint = 1n) {
    if (denominator === 0n) {
      throw new RangeError("Rational denominator must be non-zero");
    }
    const sign = denominator < 0n ? -1n : 1n;
    const divisor = gcd(numerator, denominator);
    this.numerator = (sign * numerator) / divisor;
    this.denominator = (sign * denominator) / divisor;
  }

  static fromInteger(value: bigint): Rational {
    return new Rational(value, 1n);
  }

  isZero(): boolean {
    return this.numerator === 0n;
  }

  isInteger(): boolean {
    return this.denominator === 1n;
  }

  add(other: Rational): Rational {
    return new Rational(
      this.numerator * other.denominator + other.numerator * this.denominator,
      this.denominator * other.denominator
    );
  }

  sub(other: Rational): Rational {
    return this.add(other.neg());
  }

  mul(other: Rational): Rational {
    return new Rational(
      this.numerator * other.numerator,
      this.denominator * other.denominator
    );
  }

  /** @throws {RangeError} if `other` is zero. */
  div(other: Rational): Rational {
    return new Rational(
      this.numerator * other.denominator,
      this.denominator * other.numerator
    );
  }

  /**
   * Truncated remainder: the result takes the sign of the dividend,
   * matching bigint `%`.
   * @throws {RangeError} if `other` is zero.
   */
  rem(other: Rational): Rational {
    const quotient = this.div(other);
    const truncated = quotient.numerator / quotient.denominator;
    return this.sub(other.mul(Rational.fromInteger(truncated)));
  }

  neg(): Rational {
    return new Rational(-this.numerator, this.denominator);
  }

  abs(): Rational {
    return this.numerator < 0n ? this.neg() : this;
  }

  /** Integer part, rounded toward zero. */
  trunc(): bigint {
    return this.numerator / this.denominator;
  }

  compare(other: Rational): -1 | 0 | 1 {
    const left = this.numerator * other.denominator;
    const right = other.numerator * this.denominator;
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  equals(other: Rational): boolean {
    return (
      this.numerator === other.numerator &&
      this.denominator === other.denominator
    );
  }

  /** Nearest double. Lossy for large or non-terminating fractions. */
  toNumber(): number {
    const numeratorBits = bitLength(this.numerator);
    const denominatorBits = bitLength(this.denominator);
    if (numeratorBits <= MAX_FLOAT_BITS && denominatorBits <= MAX_FLOAT_BITS) {
      return Number(this.numerator) / Number(this.denominator);
    }
    // Integer quotient with QUOTIENT_BITS significant bits, scaled back by 2^shift
    const shift = numeratorBits - denominatorBits - QUOTIENT_BITS;
    const quotient =
      shift >= 0
        ? this.numerator / (this.denominator << BigInt(shift))
        : (this.numerator << BigInt(-shift)) / this.denominator;
    return scaleByPowerOfTwo(Number(quotient), shift);
  }

  toString(): string {
    return `${this.numerator}/${this.denominator}`;
  }
}

import { describe, it, expect } from "vitest";
import { Complex } from "./complex.js";
import { Rational } from "./rational.js";
import {
  add,
  compare,
  complex,
  describeKind,
  divide,
  equals,
  factorial,
  float,
  integer,
  isTruthy,
  multiply,
  negate,
  power,
  promote,
  rational,
  remainder,
  subtract,
  toFloat,
  type Numeric,
} from "./numeric.js";
import { DomainError } from "../engine/errors.js";

function expectRational(n: Numeric, numerator: bigint, denominator: bigint): void {
  expect(n.kind).toBe("rational");
  if (n.kind === "rational") {
    expect(n.value.numerator).toBe(numerator);
    expect(n.value.denominator).toBe(denominator);
  }
}

function expectFloat(n: Numeric, value: number): void {
  expect(n.kind).toBe("float");
  if (n.kind === "float") {
    expect(n.value).toBe(value);
  }
}

// ─── Rational ──────────────────────────────────────────────────────

describe("Rational", () => {
  it("normalizes to lowest terms with a positive denominator", () => {
    const r = new Rational(4n, -6n);
    expect(r.numerator).toBe(-2n);
    expect(r.denominator).toBe(3n);
    expect(r.toString()).toBe("-2/3");
  });

  it("rejects a zero denominator", () => {
    expect(() => new Rational(1n, 0n)).toThrow(RangeError);
  });

  it("truncates the remainder toward zero", () => {
    const r = new Rational(-7n, 2n).rem(Rational.fromInteger(1n));
    expect(r.toString()).toBe("-1/2");
  });

  it("converts huge fractions to a finite double", () => {
    const big = 2n ** 1200n;
    expect(new Rational(big + 1n, big).toNumber()).toBe(1);
  });

  it("converts a huge numerator over a small denominator", () => {
    expect(new Rational(2n ** 1001n, 3n).toNumber()).toBe(2 ** 1001 / 3);
    expect(new Rational(-(2n ** 1020n), 3n).toNumber()).toBe(-(2 ** 1020) / 3);
    expect(new Rational(2n ** 1030n, 3n).toNumber()).toBe(Infinity);
  });

  it("promotes a huge rational to a finite float", () => {
    expect(add(rational(2n ** 1001n, 3n), float(0))).toEqual(float(2 ** 1001 / 3));
  });

  it("compares by cross-multiplication", () => {
    expect(new Rational(1n, 3n).compare(new Rational(1n, 2n))).toBe(-1);
    expect(new Rational(2n, 4n).compare(new Rational(1n, 2n))).toBe(0);
  });
});

// ─── Complex ───────────────────────────────────────────────────────

describe("Complex", () => {
  it("multiplies i by itself to -1", () => {
    const product = Complex.I.mul(Complex.I);
    expect(product.re).toBe(-1);
    expect(product.im).toBe(0);
  });

  it("takes the principal square root of a negative real", () => {
    const root = new Complex(-4, 0).sqrt();
    expect(root.re).toBe(0);
    expect(root.im).toBe(2);
  });

  it("computes modulus and argument", () => {
    const z = new Complex(3, 4);
    expect(z.norm()).toBe(5);
    expect(new Complex(0, 1).arg()).toBeCloseTo(Math.PI / 2);
  });

  it("treats zero exponents and zero bases specially in powc", () => {
    expect(new Complex(0, 0).powc(Complex.ZERO)).toEqual(Complex.ONE);
    expect(new Complex(0, 0).powc(new Complex(2, 0))).toEqual(Complex.ZERO);
  });
});

// ─── Promotion ─────────────────────────────────────────────────────

describe("promote", () => {
  it("keeps integer pairs as integers", () => {
    expect(promote(integer(1), integer(2)).kind).toBe("integer");
  });

  it("lifts an integer paired with a rational", () => {
    expect(promote(integer(1), rational(1n, 2n)).kind).toBe("rational");
  });

  it("lets float dominate rational", () => {
    expect(promote(rational(1n, 2n), float(0.5))).toEqual({
      kind: "float",
      left: 0.5,
      right: 0.5,
    });
  });

  it("lets complex dominate everything", () => {
    expect(promote(float(1), complex(0, 1)).kind).toBe("complex");
  });
});

// ─── Arithmetic ────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds integers exactly", () => {
    expect(add(integer(2), integer(3))).toEqual(integer(5));
  });

  it("mixes integers and rationals exactly", () => {
    expectRational(add(integer(1), rational(1n, 2n)), 3n, 2n);
    expectRational(subtract(rational(1n, 2n), integer(1)), -1n, 2n);
  });

  it("falls back to floats when a float is involved", () => {
    expectFloat(add(rational(1n, 2n), float(0.5)), 1);
    expectFloat(multiply(integer(3), float(0.5)), 1.5);
  });

  it("divides integers into rationals", () => {
    expectRational(divide(integer(10), integer(2)), 5n, 1n);
    expectRational(divide(integer(1), integer(3)), 1n, 3n);
  });

  it("turns zero divisors into IEEE values instead of raising", () => {
    expectFloat(divide(integer(1), integer(0)), Number.POSITIVE_INFINITY);
    expectFloat(divide(integer(-1), integer(0)), Number.NEGATIVE_INFINITY);
    expectFloat(divide(rational(1n, 2n), rational(0n, 1n)), Number.POSITIVE_INFINITY);
    const nan = divide(integer(0), integer(0));
    expect(nan.kind === "float" && Number.isNaN(nan.value)).toBe(true);
  });

  it("computes truncated remainders", () => {
    expect(remainder(integer(7), integer(-3))).toEqual(integer(1));
    expect(remainder(integer(-7), integer(3))).toEqual(integer(-1));
    expectRational(remainder(rational(7n, 2n), integer(1)), 1n, 2n);
  });

  it("yields NaN for a zero remainder divisor", () => {
    const result = remainder(integer(5), integer(0));
    expect(result.kind === "float" && Number.isNaN(result.value)).toBe(true);
  });

  it("negates every variant", () => {
    expect(negate(integer(4))).toEqual(integer(-4));
    expectRational(negate(rational(1n, 3n)), -1n, 3n);
    expectFloat(negate(float(2.5)), -2.5);
  });
});

describe("power", () => {
  it("raises integers exactly", () => {
    expect(power(integer(2), integer(100))).toEqual(
      integer(1267650600228229401496703205376n)
    );
  });

  it("returns the rational reciprocal for negative exponents", () => {
    expectRational(power(integer(2), integer(-2)), 1n, 4n);
  });

  it("returns Infinity for zero to a negative power", () => {
    expectFloat(power(integer(0), integer(-1)), Number.POSITIVE_INFINITY);
  });

  it("falls back to doubles for exponents beyond the exact range", () => {
    expectFloat(power(integer(2), integer(2n ** 33n)), Number.POSITIVE_INFINITY);
  });

  it("uses complex power for non-integer operands", () => {
    const root = power(float(4), float(0.5));
    expect(root.kind).toBe("complex");
    if (root.kind === "complex") {
      expect(root.value.re).toBeCloseTo(2);
      expect(root.value.im).toBe(0);
    }
  });
});

describe("factorial", () => {
  it("multiplies up to n", () => {
    expect(factorial(integer(0))).toEqual(integer(1));
    expect(factorial(integer(5))).toEqual(integer(120));
  });

  it("rejects negative integers", () => {
    expect(() => factorial(integer(-1))).toThrow("Factorial of negative integer");
  });

  it("rejects non-integers", () => {
    expect(() => factorial(float(2.5))).toThrow(DomainError);
  });
});

// ─── Comparison ────────────────────────────────────────────────────

describe("comparison", () => {
  it("orders across variants", () => {
    expect(compare(integer(1), rational(3n, 2n))).toBe(-1);
    expect(compare(float(2), integer(1))).toBe(1);
    expect(compare(rational(4n, 2n), integer(2))).toBe(0);
  });

  it("reports NaN and complex values as incomparable", () => {
    expect(compare(float(Number.NaN), float(1))).toBeUndefined();
    expect(compare(complex(1, 1), integer(0))).toBeUndefined();
  });

  it("compares values after promotion", () => {
    expect(equals(integer(2), float(2))).toBe(true);
    expect(equals(rational(1n, 2n), float(0.5))).toBe(true);
    expect(equals(complex(1, 0), integer(1))).toBe(true);
  });

  it("treats only zero as false", () => {
    expect(isTruthy(integer(0))).toBe(false);
    expect(isTruthy(rational(0n, 5n))).toBe(false);
    expect(isTruthy(float(Number.NaN))).toBe(true);
    expect(isTruthy(complex(0, 1))).toBe(true);
  });
});

describe("conversions", () => {
  it("converts real values to doubles", () => {
    expect(toFloat(rational(1n, 4n))).toBe(0.25);
    expect(toFloat(complex(3, 0))).toBe(3);
    expect(toFloat(complex(3, 1))).toBeUndefined();
  });

  it("labels each variant", () => {
    expect(describeKind(integer(1))).toBe("Integer");
    expect(describeKind(complex(0, 1))).toBe("Complex");
  });
});

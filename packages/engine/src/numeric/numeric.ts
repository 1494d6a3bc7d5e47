// ─── Numeric Tower ─────────────────────────────────────────────────
// The value domain of the calculator: integer < rational < float <
// complex. Binary operations promote both operands to the higher
// variant first. Values are immutable and shared by reference; every
// operation allocates a fresh result.

import { DomainError } from "../engine/errors";
import { Complex } from "./complex";
import { Rational } from "./rational";

export type Numeric =
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "rational"; readonly value: Rational }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "complex"; readonly value: Complex };

export type NumericKind = Numeric["kind"];

export type IntegerValue = Extract<Numeric, { kind: "integer" }>;

// ─── Constructors ──────────────────────────────────────────────────

export function integer(value: bigint | number): IntegerValue {
  return { kind: "integer", value: BigInt(value) };
}

/** @throws {RangeError} if the denominator is zero. */
export function rational(numerator: bigint, denominator: bigint): Numeric {
  return { kind: "rational", value: new Rational(numerator, denominator) };
}

export function float(value: number): Numeric {
  return { kind: "float", value };
}

export function complex(re: number, im: number): Numeric {
  return { kind: "complex", value: new Complex(re, im) };
}

function fromRational(value: Rational): Numeric {
  return { kind: "rational", value };
}

function fromComplex(value: Complex): Numeric {
  return { kind: "complex", value };
}

export const ZERO: Numeric = integer(0);

// ─── Conversions ───────────────────────────────────────────────────

/**
 * Converts to a double. Complex values convert only when they have no
 * imaginary part; otherwise returns undefined.
 */
export function toFloat(n: Numeric): number | undefined {
  switch (n.kind) {
    case "integer":
      return Number(n.value);
    case "rational":
      return n.value.toNumber();
    case "float":
      return n.value;
    case "complex":
      return n.value.im === 0 ? n.value.re : undefined;
  }
}

export function toComplex(n: Numeric): Complex {
  switch (n.kind) {
    case "integer":
      return new Complex(Number(n.value), 0);
    case "rational":
      return new Complex(n.value.toNumber(), 0);
    case "float":
      return new Complex(n.value, 0);
    case "complex":
      return n.value;
  }
}

// ─── Promotion ─────────────────────────────────────────────────────

/** Two operands lifted to the same variant. */
export type PromotedPair =
  | { readonly kind: "integer"; readonly left: bigint; readonly right: bigint }
  | { readonly kind: "rational"; readonly left: Rational; readonly right: Rational }
  | { readonly kind: "float"; readonly left: number; readonly right: number }
  | { readonly kind: "complex"; readonly left: Complex; readonly right: Complex };

type ExactValue = Extract<Numeric, { kind: "integer" | "rational" }>;

function toRational(n: ExactValue): Rational {
  return n.kind === "integer" ? Rational.fromInteger(n.value) : n.value;
}

/**
 * Lifts a pair to a common variant. Complex dominates, then float
 * (rational → float is lossy), then rational; two integers stay integers.
 */
export function promote(a: Numeric, b: Numeric): PromotedPair {
  if (a.kind === "complex" || b.kind === "complex") {
    return { kind: "complex", left: toComplex(a), right: toComplex(b) };
  }
  if (a.kind === "float" || b.kind === "float") {
    return {
      kind: "float",
      left: toFloat(a) ?? Number.NaN,
      right: toFloat(b) ?? Number.NaN,
    };
  }
  if (a.kind === "integer" && b.kind === "integer") {
    return { kind: "integer", left: a.value, right: b.value };
  }
  return { kind: "rational", left: toRational(a), right: toRational(b) };
}

// ─── Arithmetic ────────────────────────────────────────────────────

export function add(a: Numeric, b: Numeric): Numeric {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      return integer(pair.left + pair.right);
    case "rational":
      return fromRational(pair.left.add(pair.right));
    case "float":
      return float(pair.left + pair.right);
    case "complex":
      return fromComplex(pair.left.add(pair.right));
  }
}

export function subtract(a: Numeric, b: Numeric): Numeric {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      return integer(pair.left - pair.right);
    case "rational":
      return fromRational(pair.left.sub(pair.right));
    case "float":
      return float(pair.left - pair.right);
    case "complex":
      return fromComplex(pair.left.sub(pair.right));
  }
}

export function multiply(a: Numeric, b: Numeric): Numeric {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      return integer(pair.left * pair.right);
    case "rational":
      return fromRational(pair.left.mul(pair.right));
    case "float":
      return float(pair.left * pair.right);
    case "complex":
      return fromComplex(pair.left.mul(pair.right));
  }
}

/**
 * Integer ÷ integer is an exact rational. A zero integer or rational
 * divisor does not raise: the result is the float `x / 0.0`
 * (±Infinity, or NaN for 0/0).
 */
export function divide(a: Numeric, b: Numeric): Numeric {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      if (pair.right === 0n) return float(Number(pair.left) / 0);
      return rational(pair.left, pair.right);
    case "rational":
      if (pair.right.isZero()) return float(pair.left.toNumber() / 0);
      return fromRational(pair.left.div(pair.right));
    case "float":
      return float(pair.left / pair.right);
    case "complex":
      return fromComplex(pair.left.div(pair.right));
  }
}

/**
 * Truncated remainder under the usual promotion. Complex % complex has
 * no meaning and yields float NaN, as does a zero integer or rational
 * divisor.
 */
export function remainder(a: Numeric, b: Numeric): Numeric {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      if (pair.right === 0n) return float(Number.NaN);
      return integer(pair.left % pair.right);
    case "rational":
      if (pair.right.isZero()) return float(Number.NaN);
      return fromRational(pair.left.rem(pair.right));
    case "float":
      return float(pair.left % pair.right);
    case "complex":
      return float(Number.NaN);
  }
}

export function negate(n: Numeric): Numeric {
  switch (n.kind) {
    case "integer":
      return integer(-n.value);
    case "rational":
      return fromRational(n.value.neg());
    case "float":
      return float(-n.value);
    case "complex":
      return fromComplex(n.value.neg());
  }
}

/** Largest exponent computed exactly for integer powers. */
export const MAX_EXACT_EXPONENT = 0xffff_ffffn;

function exactPower(base: bigint, exponent: bigint): bigint | undefined {
  try {
    return base ** exponent;
  } catch (error) {
    // The runtime caps bigint size; report that as "not exact".
    if (error instanceof RangeError) return undefined;
    throw error;
  }
}

/**
 * Integer ^ integer is exact for exponents up to MAX_EXACT_EXPONENT in
 * magnitude (negative exponents give the rational reciprocal, and a
 * zero base there gives Infinity). Out of range falls back to double
 * precision. Every other combination is a complex power.
 */
export function power(base: Numeric, exponent: Numeric): Numeric {
  if (base.kind === "integer" && exponent.kind === "integer") {
    const b = base.value;
    const e = exponent.value;
    const magnitude = e < 0n ? -e : e;
    if (magnitude <= MAX_EXACT_EXPONENT) {
      const result = exactPower(b, magnitude);
      if (result !== undefined) {
        if (e >= 0n) return integer(result);
        if (result === 0n) return float(Number.POSITIVE_INFINITY);
        return rational(1n, result);
      }
    }
    return float(Math.pow(Number(b), Number(e)));
  }
  return fromComplex(toComplex(base).powc(toComplex(exponent)));
}

/**
 * n! by iterative accumulation. No upper bound and no memoization:
 * very large inputs run for as long as the arithmetic takes.
 *
 * @throws {DomainError} for negative integers and non-integers.
 */
export function factorial(n: Numeric): Numeric {
  if (n.kind !== "integer") {
    throw new DomainError("Factorial is only defined for integers");
  }
  if (n.value < 0n) {
    throw new DomainError("Factorial of negative integer");
  }
  let acc = 1n;
  for (let k = 2n; k <= n.value; k++) {
    acc *= k;
  }
  return integer(acc);
}

// ─── Comparison ────────────────────────────────────────────────────

/**
 * Orders two values after promotion. Returns undefined when they are
 * incomparable: either side complex, or a NaN involved.
 */
export function compare(a: Numeric, b: Numeric): -1 | 0 | 1 | undefined {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      if (pair.left < pair.right) return -1;
      if (pair.left > pair.right) return 1;
      return 0;
    case "rational":
      return pair.left.compare(pair.right);
    case "float":
      if (pair.left < pair.right) return -1;
      if (pair.left > pair.right) return 1;
      if (pair.left === pair.right) return 0;
      return undefined;
    case "complex":
      return undefined;
  }
}

/** Value equality after promotion; complex values compare by parts. */
export function equals(a: Numeric, b: Numeric): boolean {
  const pair = promote(a, b);
  switch (pair.kind) {
    case "integer":
      return pair.left === pair.right;
    case "rational":
      return pair.left.equals(pair.right);
    case "float":
      return pair.left === pair.right;
    case "complex":
      return pair.left.equals(pair.right);
  }
}

export function isZero(n: Numeric): boolean {
  switch (n.kind) {
    case "integer":
      return n.value === 0n;
    case "rational":
      return n.value.isZero();
    case "float":
      return n.value === 0;
    case "complex":
      return n.value.isZero();
  }
}

/** Zero is false; everything else, NaN included, is true. */
export function isTruthy(n: Numeric): boolean {
  return !isZero(n);
}

const KIND_LABELS: Readonly<Record<NumericKind, string>> = {
  integer: "Integer",
  rational: "Rational",
  float: "Float",
  complex: "Complex",
};

export function describeKind(n: Numeric): string {
  return KIND_LABELS[n.kind];
}

// ─── Core Functions ────────────────────────────────────────────────
// Logarithms, roots, rounding and constants. Logarithms and roots work
// in the complex plane so negative inputs have an answer.

import {
  ArgumentMismatchError,
  complex,
  factorial,
  float,
  toFloat,
  type FunctionRegistry,
  type Numeric,
  type PrimitiveFunction,
} from "@tally/engine";
import {
  assertArgCount,
  complexUnary,
  requireReal,
  singleArg,
} from "./helpers";

/** log(x) — base-10 logarithm. */
const logFn = complexUnary("log", (z) => z.log(10));

/** ln(x) — natural logarithm. */
const lnFn = complexUnary("ln", (z) => z.ln());

/** sqrt(x) — principal square root; sqrt(-4) is 2i. */
const sqrtFn = complexUnary("sqrt", (z) => z.sqrt());

/** abs(x) — keeps the variant; a complex input yields its modulus as a float. */
const absFn: PrimitiveFunction = (args) => {
  const arg = singleArg("abs", args);
  switch (arg.kind) {
    case "integer":
      return { kind: "integer", value: arg.value < 0n ? -arg.value : arg.value };
    case "rational":
      return { kind: "rational", value: arg.value.abs() };
    case "float":
      return float(Math.abs(arg.value));
    case "complex":
      return float(arg.value.norm());
  }
};

const factFn: PrimitiveFunction = (args) => factorial(singleArg("fact", args));

// ─── Rounding ──────────────────────────────────────────────────────

/**
 * Splits `(x)` or `(x, digits)`. A digits argument that has no real
 * value counts as 0.
 */
function valueAndDigits(name: string, args: readonly Numeric[]): [number, number] {
  const [value, digits] = args;
  if (value === undefined || args.length > 2) {
    throw new ArgumentMismatchError(name, 1);
  }
  const places = digits === undefined ? 0 : requireDigits(digits);
  return [requireReal(value), places];
}

function requireDigits(arg: Numeric): number {
  const raw = toFloat(arg) ?? 0;
  return Number.isNaN(raw) ? 0 : Math.trunc(raw);
}

/** Rounds half away from zero, so round(-2.5) is -3. */
function roundHalfAway(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x));
}

/** round(x[, digits]) — rounds to `digits` decimal places. */
const roundFn: PrimitiveFunction = (args) => {
  const [value, digits] = valueAndDigits("round", args);
  const multiplier = Math.pow(10, digits);
  return float(roundHalfAway(value * multiplier) / multiplier);
};

/** Rounding primitive whose optional second argument is accepted and ignored. */
function rounding(name: string, op: (x: number) => number): PrimitiveFunction {
  return (args) => {
    const [value] = valueAndDigits(name, args);
    return float(op(value));
  };
}

const floorFn = rounding("floor", Math.floor);
const ceilFn = rounding("ceil", Math.ceil);
const truncFn = rounding("trunc", Math.trunc);

// ─── Constants ─────────────────────────────────────────────────────

function constant(name: string, value: Numeric): PrimitiveFunction {
  return (args) => {
    assertArgCount(name, args, 0);
    return value;
  };
}

export function registerCoreFunctions(registry: FunctionRegistry): void {
  registry.register("log", logFn);
  registry.register("ln", lnFn);
  registry.register("sqrt", sqrtFn);
  registry.register("abs", absFn);
  registry.register("ABS", absFn);
  registry.register("fact", factFn);
  registry.register("FACT", factFn);
  registry.register("round", roundFn);
  registry.register("ROUND", roundFn);
  registry.register("floor", floorFn);
  registry.register("FLOOR", floorFn);
  registry.register("ceil", ceilFn);
  registry.register("CEILING", ceilFn);
  registry.register("trunc", truncFn);
  registry.register("TRUNC", truncFn);

  registry.register("pi", constant("pi", float(Math.PI)));
  registry.register("e", constant("e", float(Math.E)));
  registry.register("i", constant("i", complex(0, 1)));
}

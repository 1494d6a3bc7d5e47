// ─── Statistics ────────────────────────────────────────────────────
// Exact where the inputs are exact: mean(1, 2) is 3/2, not 1.5.

import {
  TypeMismatchError,
  add,
  compare,
  describeKind,
  divide,
  float,
  integer,
  multiply,
  subtract,
  toComplex,
  type FunctionRegistry,
  type Numeric,
  type PrimitiveFunction,
} from "@tally/engine";
import { assertMinArgs, fromComplex } from "./helpers";

function sum(values: readonly Numeric[]): Numeric {
  return values.reduce<Numeric>((acc, value) => add(acc, value), integer(0));
}

function requireRealValues(values: readonly Numeric[]): void {
  for (const value of values) {
    if (value.kind === "complex") {
      throw new TypeMismatchError("real number", describeKind(value));
    }
  }
}

/** mean(x1, …, xn) — arithmetic mean. */
const meanFn: PrimitiveFunction = (args) => {
  assertMinArgs("mean", args, 1);
  return divide(sum(args), integer(args.length));
};

/** median(x1, …, xn) — middle value, or the mean of the two middle values. */
const medianFn: PrimitiveFunction = (args) => {
  assertMinArgs("median", args, 1);
  requireRealValues(args);

  const sorted = [...args].sort((a, b) => compare(a, b) ?? 0);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid]!;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  return divide(add(sorted[mid - 1]!, upper), integer(2));
};

/** var(x1, …, xn) — sample variance (n - 1 denominator). */
const varianceFn: PrimitiveFunction = (args) => {
  assertMinArgs("var", args, 2);
  const mean = meanFn(args);
  const squares = args.map((x) => {
    const diff = subtract(x, mean);
    return multiply(diff, diff);
  });
  return divide(sum(squares), integer(args.length - 1));
};

/** std(x1, …, xn) — sample standard deviation. */
const stdFn: PrimitiveFunction = (args) => {
  assertMinArgs("std", args, 2);
  return fromComplex(toComplex(varianceFn(args)).sqrt());
};

/**
 * Picks the extreme argument by `compare`; the winner is returned
 * unchanged. A NaN anywhere makes the result NaN.
 */
function extreme(name: string, wins: (order: -1 | 0 | 1) => boolean): PrimitiveFunction {
  return (args) => {
    assertMinArgs(name, args, 1);
    requireRealValues(args);

    let best = args[0]!;
    for (const value of args.slice(1)) {
      const order = compare(value, best);
      if (order === undefined) return float(Number.NaN);
      if (wins(order)) best = value;
    }
    if (compare(best, best) === undefined) return float(Number.NaN);
    return best;
  };
}

const minFn = extreme("min", (order) => order < 0);
const maxFn = extreme("max", (order) => order > 0);

export function registerStatisticsFunctions(registry: FunctionRegistry): void {
  registry.register("mean", meanFn);
  registry.register("median", medianFn);
  registry.register("var", varianceFn);
  registry.register("std", stdFn);
  registry.register("min", minFn);
  registry.register("max", maxFn);
}

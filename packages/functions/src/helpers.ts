// ─── Argument Helpers ──────────────────────────────────────────────
// Shared arity and type checks for primitives. Each throws the engine
// error the evaluator reports to the caller.

import {
  ArgumentMismatchError,
  GenericEngineError,
  TypeMismatchError,
  describeKind,
  integer,
  toComplex,
  toFloat,
  type Complex,
  type Numeric,
  type PrimitiveFunction,
} from "@tally/engine";

/** Validates that exactly `expected` arguments were passed. */
export function assertArgCount(
  name: string,
  args: readonly Numeric[],
  expected: number
): void {
  if (args.length !== expected) {
    throw new ArgumentMismatchError(name, expected);
  }
}

/** Validates that at least `minimum` arguments were passed. */
export function assertMinArgs(
  name: string,
  args: readonly Numeric[],
  minimum: number
): void {
  if (args.length < minimum) {
    throw new ArgumentMismatchError(name, minimum, true);
  }
}

/** Returns the only argument of a unary primitive. */
export function singleArg(name: string, args: readonly Numeric[]): Numeric {
  const [value] = args;
  if (value === undefined || args.length !== 1) {
    throw new ArgumentMismatchError(name, 1);
  }
  return value;
}

/** Returns both arguments of a binary primitive. */
export function pairArgs(
  name: string,
  args: readonly Numeric[]
): [Numeric, Numeric] {
  const [left, right] = args;
  if (left === undefined || right === undefined || args.length !== 2) {
    throw new ArgumentMismatchError(name, 2);
  }
  return [left, right];
}

export function requireInteger(arg: Numeric): bigint {
  if (arg.kind !== "integer") {
    throw new TypeMismatchError("Integer", describeKind(arg));
  }
  return arg.value;
}

/** Real value as a double; complex values with an imaginary part fail. */
export function requireReal(arg: Numeric): number {
  const value = toFloat(arg);
  if (value === undefined) {
    throw new GenericEngineError("Cannot convert to float");
  }
  return value;
}

export function fromBoolean(value: boolean): Numeric {
  return integer(value ? 1 : 0);
}

export function fromComplex(value: Complex): Numeric {
  return { kind: "complex", value };
}

/** Wraps a Complex method as a unary primitive with complex output. */
export function complexUnary(
  name: string,
  op: (z: Complex) => Complex
): PrimitiveFunction {
  return (args) => {
    const arg = singleArg(name, args);
    return fromComplex(op(toComplex(arg)));
  };
}

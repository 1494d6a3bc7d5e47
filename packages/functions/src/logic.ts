// ─── Logic Functions ───────────────────────────────────────────────
// Zero is false and any other value is true. Results are integer 0/1,
// except IF, which returns one of its arguments.
//
// Arguments reach a primitive already evaluated, so IF evaluates both
// branches before choosing one.

import {
  ArgumentMismatchError,
  isTruthy,
  type FunctionRegistry,
  type PrimitiveFunction,
} from "@tally/engine";
import { fromBoolean, singleArg } from "./helpers";

const trueFn: PrimitiveFunction = () => fromBoolean(true);

const falseFn: PrimitiveFunction = () => fromBoolean(false);

const notFn: PrimitiveFunction = (args) =>
  fromBoolean(!isTruthy(singleArg("not", args)));

const andFn: PrimitiveFunction = (args) => fromBoolean(args.every(isTruthy));

const orFn: PrimitiveFunction = (args) => fromBoolean(args.some(isTruthy));

/** True when an odd number of arguments are true. */
const xorFn: PrimitiveFunction = (args) =>
  fromBoolean(args.filter(isTruthy).length % 2 === 1);

/** IF(condition, then, else) */
const ifFn: PrimitiveFunction = (args) => {
  const [condition, whenTrue, whenFalse] = args;
  if (
    args.length !== 3 ||
    condition === undefined ||
    whenTrue === undefined ||
    whenFalse === undefined
  ) {
    throw new ArgumentMismatchError("if", 3);
  }
  return isTruthy(condition) ? whenTrue : whenFalse;
};

const LOGIC_FUNCTIONS: ReadonlyArray<readonly [string, PrimitiveFunction]> = [
  ["TRUE", trueFn],
  ["FALSE", falseFn],
  ["NOT", notFn],
  ["AND", andFn],
  ["OR", orFn],
  ["XOR", xorFn],
  ["IF", ifFn],
];

/** Registers each function under its upper- and lower-case name. */
export function registerLogicFunctions(registry: FunctionRegistry): void {
  for (const [name, fn] of LOGIC_FUNCTIONS) {
    registry.register(name, fn);
    registry.register(name.toLowerCase(), fn);
  }
}

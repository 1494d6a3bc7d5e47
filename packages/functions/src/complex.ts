// ─── Complex Parts ─────────────────────────────────────────────────
// Real inputs are their own conjugate and real part; complex parts
// come back as floats.

import {
  float,
  integer,
  toComplex,
  type FunctionRegistry,
  type PrimitiveFunction,
} from "@tally/engine";
import { fromComplex, singleArg } from "./helpers";

/** conj(z) — complex conjugate. */
const conjFn: PrimitiveFunction = (args) => {
  const arg = singleArg("conj", args);
  return arg.kind === "complex" ? fromComplex(arg.value.conj()) : arg;
};

/** re(z) — real part. */
const reFn: PrimitiveFunction = (args) => {
  const arg = singleArg("re", args);
  return arg.kind === "complex" ? float(arg.value.re) : arg;
};

/** im(z) — imaginary part; exact zero for integers and rationals. */
const imFn: PrimitiveFunction = (args) => {
  const arg = singleArg("im", args);
  switch (arg.kind) {
    case "complex":
      return float(arg.value.im);
    case "float":
      return float(0);
    default:
      return integer(0);
  }
};

/** arg(z) — principal argument in radians. */
const argFn: PrimitiveFunction = (args) =>
  float(toComplex(singleArg("arg", args)).arg());

export function registerComplexFunctions(registry: FunctionRegistry): void {
  registry.register("conj", conjFn);
  registry.register("re", reFn);
  registry.register("im", imFn);
  registry.register("arg", argFn);
}

// ─── Bitwise Functions ─────────────────────────────────────────────
// Integer-only. And/or/xor/not/shift act on unbounded two's-complement
// integers; rotations treat the value as a signed 64-bit word.

import {
  GenericEngineError,
  integer,
  type FunctionRegistry,
  type PrimitiveFunction,
} from "@tally/engine";
import { pairArgs, requireInteger, singleArg } from "./helpers";

const WORD_BITS = 64n;
const MAX_ROTATION = 0xffff_ffffn;

// The runtime cannot allocate a bigint wider than 2^30 bits.
const MAX_SHIFT = 1n << 30n;

function binary(name: string, op: (a: bigint, b: bigint) => bigint): PrimitiveFunction {
  return (args) => {
    const [left, right] = pairArgs(name, args);
    return integer(op(requireInteger(left), requireInteger(right)));
  };
}

function shiftCount(count: bigint): bigint {
  if (count < 0n) {
    throw new GenericEngineError("Shift count too large or negative");
  }
  return count;
}

function bitLength(value: bigint): bigint {
  return BigInt((value < 0n ? -value : value).toString(2).length);
}

const lshFn = binary("lsh", (a, b) => {
  const count = shiftCount(b);
  if (a === 0n) return 0n;
  if (bitLength(a) + count > MAX_SHIFT) {
    throw new GenericEngineError("Shift count too large or negative");
  }
  return a << count;
});

/** Arithmetic right shift: rounds toward negative infinity. */
const rshFn = binary("rsh", (a, b) => {
  const count = shiftCount(b);
  if (count > MAX_SHIFT) return a < 0n ? -1n : 0n;
  return a >> count;
});

function rotationOperands(value: bigint, rotation: bigint): [bigint, bigint] {
  if (
    value !== BigInt.asIntN(64, value) ||
    rotation < 0n ||
    rotation > MAX_ROTATION
  ) {
    throw new GenericEngineError("Rotation arguments too large");
  }
  return [BigInt.asUintN(64, value), rotation % WORD_BITS];
}

function rotateLeft(word: bigint, count: bigint): bigint {
  const rotated = (word << count) | (word >> (WORD_BITS - count));
  return BigInt.asIntN(64, BigInt.asUintN(64, rotated));
}

const rolFn = binary("rol", (a, b) => {
  const [word, count] = rotationOperands(a, b);
  return rotateLeft(word, count);
});

const rorFn = binary("ror", (a, b) => {
  const [word, count] = rotationOperands(a, b);
  return rotateLeft(word, (WORD_BITS - count) % WORD_BITS);
});

const bnotFn: PrimitiveFunction = (args) =>
  integer(~requireInteger(singleArg("bnot", args)));

export function registerBitwiseFunctions(registry: FunctionRegistry): void {
  registry.register("band", binary("band", (a, b) => a & b));
  registry.register("bor", binary("bor", (a, b) => a | b));
  registry.register("bxor", binary("bxor", (a, b) => a ^ b));
  registry.register("bnot", bnotFn);
  registry.register("lsh", lshFn);
  registry.register("rsh", rshFn);
  registry.register("rol", rolFn);
  registry.register("ror", rorFn);
}

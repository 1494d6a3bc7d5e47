import { describe, it, expect } from "vitest";
import {
  Context,
  UndefinedVariableError,
  evaluate,
  integer,
  type Numeric,
} from "@tally/engine";
import { createStandardRegistry } from "./index.js";

const registry = createStandardRegistry();

function calc(text: string): Numeric {
  return evaluate(text, new Context(), { registry });
}

describe("boolean functions", () => {
  it.each([
    ["TRUE()", 1],
    ["false()", 0],
    ["NOT(0)", 1],
    ["not(3)", 0],
    ["AND(1, 2)", 1],
    ["and(1, 0)", 0],
    ["AND()", 1],
    ["OR(0, 0)", 0],
    ["or(0, 0.5)", 1],
    ["XOR(1, 1, 1)", 1],
    ["xor(1, 1)", 0],
  ])("%s = %s", (source, expected) => {
    expect(calc(source)).toEqual(integer(expected));
  });
});

describe("IF", () => {
  it("selects a branch by truthiness", () => {
    expect(calc("IF(0, 10, 20)")).toEqual(integer(20));
    expect(calc("if(1/2, 3, 4)")).toEqual(integer(3));
  });

  it("requires exactly three arguments", () => {
    expect(() => calc("IF(1, 2)")).toThrow("Function 'if' requires exactly 3 argument(s)");
  });

  it("evaluates both branches before choosing", () => {
    expect(() => calc("if(1, 1, missing)")).toThrow(UndefinedVariableError);
  });
});

import { describe, it, expect } from "vitest";
import {
  ArgumentMismatchError,
  Context,
  evaluate,
  formatNumber,
  type Numeric,
} from "@tally/engine";
import { createStandardRegistry } from "./index.js";

const registry = createStandardRegistry();

function calc(text: string): Numeric {
  return evaluate(text, new Context(), { registry });
}

function realPart(text: string): number {
  const result = calc(text);
  return result.kind === "complex" ? result.value.re : Number.NaN;
}

describe("fv", () => {
  it("uses the linear formula at a zero rate", () => {
    expect(formatNumber(calc("fv(0, 10, 100)"))).toBe("-100");
  });

  it("compounds a present value", () => {
    expect(realPart("fv(0.05, 10, -100)")).toBeCloseTo(162.8894626777442, 6);
  });
});

describe("pv", () => {
  it("discounts a future value", () => {
    expect(realPart("pv(0.1, 1, 110)")).toBeCloseTo(-100, 9);
  });
});

describe("pmt", () => {
  it("computes an annuity payment", () => {
    expect(realPart("pmt(0.1, 2, 100)")).toBeCloseTo(-57.61904761904762, 6);
  });

  it("splits evenly at a zero rate", () => {
    expect(formatNumber(calc("pmt(0, 4, 100)"))).toBe("-25");
  });
});

describe("nper", () => {
  it("counts periods at a zero rate", () => {
    expect(formatNumber(calc("nper(0, -10, 100)"))).toBe("10");
  });

  it("counts periods with interest", () => {
    expect(realPart("nper(0.05, -100, 1000)")).toBeCloseTo(14.206699082890461, 6);
  });
});

describe("npv", () => {
  it("discounts each cash flow from period one", () => {
    expect(realPart("npv(0.1, 110)")).toBeCloseTo(100, 9);
    expect(realPart("npv(0.1, 110, 121)")).toBeCloseTo(200, 9);
  });

  it("requires a rate and a cash flow", () => {
    expect(() => calc("npv(0.1)")).toThrow(ArgumentMismatchError);
  });
});

describe("irr and rate", () => {
  it("finds the internal rate of return", () => {
    expect(realPart("irr(-100, 110)")).toBeCloseTo(0.1, 9);
    expect(realPart("irr(-100, 60, 60)")).toBeCloseTo(0.1306623862918075, 6);
  });

  it("solves for the periodic rate", () => {
    expect(realPart("rate(10, 0, -100, 200)")).toBeCloseTo(0.07177346253629313, 6);
  });

  it("checks arity", () => {
    expect(() => calc("fv(0.1, 1)")).toThrow(
      "Function 'fv' requires exactly 3 argument(s)"
    );
    expect(() => calc("rate(1, 2)")).toThrow(
      "Function 'rate' requires at least 3 argument(s)"
    );
  });
});

import { describe, it, expect } from "vitest";
import {
  formatComplex,
  formatFloat,
  formatInteger,
  formatNumber,
  formatNumberDecimal,
} from "./format.js";
import { Complex } from "../numeric/complex.js";
import { complex, float, integer, rational } from "../numeric/index.js";

describe("formatFloat", () => {
  it("prints non-integral values in shortest form", () => {
    expect(formatFloat(2.5)).toBe("2.5");
    expect(formatFloat(0.1 + 0.2)).toBe("0.30000000000000004");
  });

  it("snaps values within tolerance of an integer", () => {
    expect(formatFloat(3.00000000001)).toBe("3");
    expect(formatFloat(-2)).toBe("-2");
    expect(formatFloat(-0)).toBe("0");
  });

  it("keeps large integral values in plain digits", () => {
    expect(formatFloat(1e21)).toBe("1000000000000000000000");
  });

  it("prints non-finite values as-is", () => {
    expect(formatFloat(Number.NaN)).toBe("NaN");
    expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("-Infinity");
  });
});

describe("formatComplex", () => {
  it.each([
    [new Complex(3, 1e-12), "3"],
    [new Complex(0, 1), "1i"],
    [new Complex(0, -2), "-2i"],
    [new Complex(1, -2), "1 - 2i"],
    [new Complex(1.5, 0.5), "1.5 + 0.5i"],
  ])("formats %s", (value, expected) => {
    expect(formatComplex(value)).toBe(expected);
  });
});

describe("formatNumber", () => {
  it("prints rationals as fractions", () => {
    expect(formatNumber(rational(1n, 2n))).toBe("1/2");
    expect(formatNumber(rational(-3n, 4n))).toBe("-3/4");
    expect(formatNumber(rational(5n, 1n))).toBe("5");
  });

  it("prints every other variant", () => {
    expect(formatNumber(integer(5))).toBe("5");
    expect(formatNumber(float(0.25))).toBe("0.25");
    expect(formatNumber(complex(0, 3))).toBe("3i");
  });
});

describe("formatNumberDecimal", () => {
  it("prints non-integral rationals as decimals", () => {
    expect(formatNumberDecimal(rational(1n, 2n))).toBe("0.5");
    expect(formatNumberDecimal(rational(1n, 3n))).toBe("0.3333333333333333");
    expect(formatNumberDecimal(rational(-3n, 4n))).toBe("-0.75");
  });

  it("matches formatNumber elsewhere", () => {
    expect(formatNumberDecimal(rational(5n, 1n))).toBe("5");
    expect(formatNumberDecimal(integer(5))).toBe("5");
  });
});

describe("formatInteger", () => {
  it("prefixes each radix", () => {
    expect(formatInteger(integer(255), 16)).toBe("0xFF");
    expect(formatInteger(integer(8), 8)).toBe("0o10");
    expect(formatInteger(integer(5), 2)).toBe("0b101");
    expect(formatInteger(integer(0), 16)).toBe("0x0");
  });

  it("puts the sign before the prefix", () => {
    expect(formatInteger(integer(-255), 16)).toBe("-0xFF");
  });
});

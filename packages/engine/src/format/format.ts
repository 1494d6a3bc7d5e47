// ─── Number Formatting ─────────────────────────────────────────────
// Display strings for calculator results. Floats within EPSILON of an
// integer print as that integer, so 0.1 + 0.2 - 0.3 reads as "0".

import type { Complex } from "../numeric/complex";
import type { IntegerValue, Numeric } from "../numeric/index";

export const EPSILON = 1e-10;

export function formatFloat(value: number): string {
  const fraction = value - Math.trunc(value);
  if (Number.isFinite(value) && Math.abs(fraction) < EPSILON) {
    const rounded = Math.round(value);
    // Avoid "-0" and keep large magnitudes in plain digits
    return rounded === 0 ? "0" : BigInt(rounded).toString();
  }
  return String(value);
}

/** `a`, `bi`, `-bi`, `a + bi` or `a - bi`; parts within EPSILON of zero are dropped. */
export function formatComplex(value: Complex): string {
  const { re, im } = value;
  if (Math.abs(im) < EPSILON) {
    return formatFloat(re);
  }

  const imText = `${formatFloat(Math.abs(im))}i`;
  if (Math.abs(re) < EPSILON) {
    return im < 0 ? `-${imText}` : imText;
  }
  return `${formatFloat(re)} ${im < 0 ? "-" : "+"} ${imText}`;
}

/** Exact form: rationals print as `p/q`. */
export function formatNumber(n: Numeric): string {
  switch (n.kind) {
    case "integer":
      return n.value.toString();
    case "rational":
      return n.value.isInteger()
        ? n.value.numerator.toString()
        : n.value.toString();
    case "float":
      return formatFloat(n.value);
    case "complex":
      return formatComplex(n.value);
  }
}

/** Like `formatNumber`, but non-integral rationals print as decimals. */
export function formatNumberDecimal(n: Numeric): string {
  if (n.kind === "rational" && !n.value.isInteger()) {
    return formatFloat(n.value.toNumber());
  }
  return formatNumber(n);
}

export type Radix = 2 | 8 | 16;

const RADIX_PREFIXES: Readonly<Record<Radix, string>> = {
  2: "0b",
  8: "0o",
  16: "0x",
};

/** Prefixed digits in the given radix, hex upper-case: -255 → "-0xFF". */
export function formatInteger(n: IntegerValue, radix: Radix): string {
  const magnitude = n.value < 0n ? -n.value : n.value;
  const digits = magnitude.toString(radix).toUpperCase();
  return `${n.value < 0n ? "-" : ""}${RADIX_PREFIXES[radix]}${digits}`;
}

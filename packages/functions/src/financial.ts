// ─── Financial Functions ───────────────────────────────────────────
// Time-value-of-money primitives in spreadsheet argument order.
// Cash paid out is negative, cash received positive. `type` is 0 for
// payments at the end of each period and 1 for the start.
//
// fv/pv/pmt/nper run in complex arithmetic so that fractional periods
// on negative growth factors still produce a value. irr and rate
// iterate on the real parts only.

import {
  ArgumentMismatchError,
  Complex,
  toComplex,
  type FunctionRegistry,
  type Numeric,
  type PrimitiveFunction,
} from "@tally/engine";
import { assertMinArgs, fromComplex } from "./helpers";

/** Rates closer to zero than this use the linear (interest-free) formulas. */
const ZERO_RATE = 1e-9;

const MAX_ITERATIONS = 100;

interface AnnuityArgs {
  readonly rate: Complex;
  readonly second: Complex;
  readonly third: Complex;
  readonly fourth: Complex;
  readonly type: number;
}

/** `(rate, a, b[, c[, type]])` — the shape shared by fv, pv, pmt and nper. */
function annuityArgs(name: string, args: readonly Numeric[]): AnnuityArgs {
  if (args.length < 3 || args.length > 5) {
    throw new ArgumentMismatchError(name, 3);
  }
  const values = args.map(toComplex);
  return {
    rate: values[0] ?? Complex.ZERO,
    second: values[1] ?? Complex.ZERO,
    third: values[2] ?? Complex.ZERO,
    fourth: values[3] ?? Complex.ZERO,
    type: periodType(values[4]),
  };
}

function periodType(value: Complex | undefined): number {
  if (value === undefined || Number.isNaN(value.re)) return 0;
  return Math.trunc(value.re);
}

/** (1 + rate·type), the payment timing adjustment. */
function timing(rate: Complex, type: number): Complex {
  return Complex.ONE.add(rate.scale(type));
}

/** fv(rate, nper, pv[, pmt[, type]]) */
const fvFn: PrimitiveFunction = (args) => {
  const { rate, second: nper, third: pv, fourth: pmt, type } = annuityArgs("fv", args);
  if (rate.norm() < ZERO_RATE) {
    return fromComplex(pv.add(pmt.mul(nper)).neg());
  }
  const factor = Complex.ONE.add(rate).powc(nper);
  const payments = pmt.mul(timing(rate, type)).mul(factor.sub(Complex.ONE).div(rate));
  return fromComplex(pv.mul(factor).add(payments).neg());
};

/** pv(rate, nper, fv[, pmt[, type]]) */
const pvFn: PrimitiveFunction = (args) => {
  const { rate, second: nper, third: fv, fourth: pmt, type } = annuityArgs("pv", args);
  if (rate.norm() < ZERO_RATE) {
    return fromComplex(fv.add(pmt.mul(nper)).neg());
  }
  const factor = Complex.ONE.add(rate).powc(nper);
  const payments = pmt.mul(timing(rate, type)).mul(factor.sub(Complex.ONE).div(rate));
  return fromComplex(fv.add(payments).neg().div(factor));
};

/** pmt(rate, nper, pv[, fv[, type]]) */
const pmtFn: PrimitiveFunction = (args) => {
  const { rate, second: nper, third: pv, fourth: fv, type } = annuityArgs("pmt", args);
  if (rate.norm() < ZERO_RATE) {
    return fromComplex(fv.add(pv).neg().div(nper));
  }
  const factor = Complex.ONE.add(rate).powc(nper);
  const numerator = pv.mul(factor).add(fv).mul(rate);
  const denominator = timing(rate, type).mul(factor.sub(Complex.ONE));
  return fromComplex(numerator.div(denominator).neg());
};

/** nper(rate, pmt, pv[, fv[, type]]) */
const nperFn: PrimitiveFunction = (args) => {
  const { rate, second: pmt, third: pv, fourth: fv, type } = annuityArgs("nper", args);
  if (rate.norm() < ZERO_RATE) {
    return fromComplex(fv.add(pv).neg().div(pmt));
  }
  const adjusted = pmt.mul(timing(rate, type));
  const numerator = adjusted.sub(fv.mul(rate));
  const denominator = adjusted.add(pv.mul(rate));
  return fromComplex(numerator.div(denominator).ln().div(Complex.ONE.add(rate).ln()));
};

/** npv(rate, v1, …, vn) — cash flows discounted from the end of period 1. */
const npvFn: PrimitiveFunction = (args) => {
  assertMinArgs("npv", args, 2);
  const [rate = Complex.ZERO, ...cashFlows] = args.map(toComplex);
  const growth = Complex.ONE.add(rate);
  // Each term raises the growth factor independently so rounding does not accumulate
  const total = cashFlows.reduce(
    (acc, value, index) => acc.add(value.div(growth.powc(new Complex(index + 1, 0)))),
    Complex.ZERO
  );
  return fromComplex(total);
};

/** irr(v0, v1, …, vn) — Newton's method from a 10% guess; v0 is undiscounted. */
const irrFn: PrimitiveFunction = (args) => {
  assertMinArgs("irr", args, 1);
  const values = args.map((arg) => toComplex(arg).re);
  let guess = 0.1;

  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
    let npv = 0;
    let derivative = 0;
    values.forEach((value, t) => {
      npv += value / Math.pow(1 + guess, t);
      if (t > 0) {
        derivative -= (t * value) / Math.pow(1 + guess, t + 1);
      }
    });
    if (Math.abs(npv) < 1e-7) break;
    if (Math.abs(derivative) < 1e-10) break;
    guess -= npv / derivative;
  }

  return fromComplex(new Complex(guess, 0));
};

/**
 * rate(nper, pmt, pv[, fv[, type[, guess]]]) — Newton's method with a
 * forward-difference derivative.
 */
const rateFn: PrimitiveFunction = (args) => {
  assertMinArgs("rate", args, 3);
  const [nper = 0, pmt = 0, pv = 0, fv = 0, typeValue, initialGuess] = args.map(
    (arg) => toComplex(arg).re
  );
  const type = typeValue === undefined || Number.isNaN(typeValue) ? 0 : Math.trunc(typeValue);

  const balance = (r: number): number => {
    const factor = Math.pow(1 + r, nper);
    const payments = pmt * (1 + r * type) * ((factor - 1) / r);
    return pv * factor + payments + fv;
  };

  let guess = initialGuess ?? 0.1;
  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
    if (Math.abs(guess) < ZERO_RATE) {
      if (Math.abs(pv + pmt * nper + fv) < 1e-7) {
        return fromComplex(Complex.ZERO);
      }
      guess = 0.0001;
      continue;
    }

    const delta = 1e-5;
    const y = balance(guess);
    const derivative = (balance(guess + delta) - y) / delta;
    if (Math.abs(derivative) < 1e-10) break;

    const next = guess - y / derivative;
    if (Math.abs(next - guess) < 1e-7) {
      return fromComplex(new Complex(next, 0));
    }
    guess = next;
  }

  return fromComplex(new Complex(guess, 0));
};

export function registerFinancialFunctions(registry: FunctionRegistry): void {
  registry.register("fv", fvFn);
  registry.register("pv", pvFn);
  registry.register("pmt", pmtFn);
  registry.register("nper", nperFn);
  registry.register("npv", npvFn);
  registry.register("irr", irrFn);
  registry.register("rate", rateFn);
}

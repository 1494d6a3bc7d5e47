export { Rational } from "./rational";
export { Complex } from "./complex";
export {
  type Numeric,
  type NumericKind,
  type IntegerValue,
  type PromotedPair,
  integer,
  rational,
  float,
  complex,
  ZERO,
  toFloat,
  toComplex,
  promote,
  add,
  subtract,
  multiply,
  divide,
  remainder,
  negate,
  power,
  factorial,
  compare,
  equals,
  isZero,
  isTruthy,
  describeKind,
  MAX_EXACT_EXPONENT,
} from "./numeric";

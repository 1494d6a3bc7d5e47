export {
  EPSILON,
  formatFloat,
  formatComplex,
  formatNumber,
  formatNumberDecimal,
  formatInteger,
  type Radix,
} from "./format";

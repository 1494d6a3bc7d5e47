// ─── Trigonometry ──────────────────────────────────────────────────
// Circular functions over the complex plane, in radians. Results are
// always complex; real inputs come back with a zero imaginary part.

import type { FunctionRegistry } from "@tally/engine";
import { complexUnary } from "./helpers";

export function registerTrigonometryFunctions(registry: FunctionRegistry): void {
  registry.register("sin", complexUnary("sin", (z) => z.sin()));
  registry.register("cos", complexUnary("cos", (z) => z.cos()));
  registry.register("tan", complexUnary("tan", (z) => z.tan()));
  registry.register("asin", complexUnary("asin", (z) => z.asin()));
  registry.register("acos", complexUnary("acos", (z) => z.acos()));
  registry.register("atan", complexUnary("atan", (z) => z.atan()));
}

// ─── Hyperbolic Functions ──────────────────────────────────────────

import type { FunctionRegistry } from "@tally/engine";
import { complexUnary } from "./helpers";

export function registerHyperbolicFunctions(registry: FunctionRegistry): void {
  registry.register("sinh", complexUnary("sinh", (z) => z.sinh()));
  registry.register("cosh", complexUnary("cosh", (z) => z.cosh()));
  registry.register("tanh", complexUnary("tanh", (z) => z.tanh()));
}

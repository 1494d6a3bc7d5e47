// ─── @tally/functions ──────────────────────────────────────────────
// The standard primitive library: maths, statistics, bitwise, logic
// and finance. Primitives are registered into a FunctionRegistry, so
// each session or embedding chooses which ones it exposes.

import { FunctionRegistry } from "@tally/engine";
import { registerBitwiseFunctions } from "./bitwise";
import { registerComplexFunctions } from "./complex";
import { registerCoreFunctions } from "./core";
import { registerFinancialFunctions } from "./financial";
import { registerHyperbolicFunctions } from "./hyperbolic";
import { registerLogicFunctions } from "./logic";
import { registerStatisticsFunctions } from "./statistics";
import { registerTrigonometryFunctions } from "./trigonometry";

export {
  registerBitwiseFunctions,
  registerComplexFunctions,
  registerCoreFunctions,
  registerFinancialFunctions,
  registerHyperbolicFunctions,
  registerLogicFunctions,
  registerStatisticsFunctions,
  registerTrigonometryFunctions,
};

/**
 * Registers every standard primitive. Later groups overwrite earlier
 * ones on a name clash.
 */
export function registerAllFunctions(registry: FunctionRegistry): void {
  registerCoreFunctions(registry);
  registerTrigonometryFunctions(registry);
  registerHyperbolicFunctions(registry);
  registerComplexFunctions(registry);
  registerStatisticsFunctions(registry);
  registerBitwiseFunctions(registry);
  registerLogicFunctions(registry);
  registerFinancialFunctions(registry);
}

/** A fresh registry holding the whole standard library. */
export function createStandardRegistry(): FunctionRegistry {
  const registry = new FunctionRegistry();
  registerAllFunctions(registry);
  return registry;
}

// ─── Function Registry ─────────────────────────────────────────────
// Primitive functions callable from expressions. The evaluator falls
// back to a registry only after the context's user functions miss.

import type { Numeric } from "../numeric/index";

/**
 * A primitive receives fully evaluated arguments and returns a value.
 * It may throw an EngineError (arity, type, domain).
 */
export type PrimitiveFunction = (args: readonly Numeric[]) => Numeric;

export class FunctionRegistry {
  private readonly functions = new Map<string, PrimitiveFunction>();

  /**
   * Registers a primitive. Overwrites any existing function with the
   * same name; names are case-sensitive.
   */
  register(name: string, fn: PrimitiveFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  /** Returns true if the function existed. */
  unregister(name: string): boolean {
    return this.functions.delete(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  get(name: string): PrimitiveFunction | undefined {
    return this.functions.get(name);
  }

  names(): readonly string[] {
    return Array.from(this.functions.keys());
  }

  clear(): void {
    this.functions.clear();
  }
}

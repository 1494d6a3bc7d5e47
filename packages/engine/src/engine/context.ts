// ─── Evaluation Context ────────────────────────────────────────────
// Variable scopes plus the user-function table. Scoping is dynamic:
// lookups walk from the innermost scope outwards, so a function body
// sees the caller's locals as well as its own parameters.

import type { Expr } from "./ast";
import type { Numeric } from "../numeric/index";

/** A function defined by the user with `name(params) = body`. */
export interface UserFunction {
  readonly params: readonly string[];
  readonly body: Expr;
}

export class Context {
  /** Global scope first, innermost last. Never empty. */
  private readonly scopes: Map<string, Numeric>[] = [new Map()];
  private readonly functions = new Map<string, UserFunction>();

  /** Number of live scopes, the global one included. */
  get depth(): number {
    return this.scopes.length;
  }

  /** Searches innermost → outermost and returns the first binding found. */
  getVariable(name: string): Numeric | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const value = this.scopes[i]!.get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  /**
   * Overwrites the first existing binding in search order. When the
   * name is bound nowhere, defines it in the innermost scope.
   */
  setVariable(name: string, value: Numeric): void {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i]!;
      if (scope.has(name)) {
        scope.set(name, value);
        return;
      }
    }
    this.innermost().set(name, value);
  }

  /** Binds in the innermost scope regardless of outer bindings. */
  defineVariable(name: string, value: Numeric): void {
    this.innermost().set(name, value);
  }

  pushScope(): void {
    this.scopes.push(new Map());
  }

  /** Discards the innermost scope. The global scope is never removed. */
  popScope(): void {
    if (this.scopes.length > 1) {
      this.scopes.pop();
    }
  }

  getFunction(name: string): UserFunction | undefined {
    return this.functions.get(name);
  }

  /** Defines or replaces a user function. */
  defineFunction(name: string, fn: UserFunction): void {
    this.functions.set(name, fn);
  }

  functionNames(): readonly string[] {
    return Array.from(this.functions.keys());
  }

  /** Read-only view of the global scope. */
  globals(): ReadonlyMap<string, Numeric> {
    return this.scopes[0]!;
  }

  private innermost(): Map<string, Numeric> {
    return this.scopes[this.scopes.length - 1]!;
  }
}

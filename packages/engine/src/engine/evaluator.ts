// ─── Evaluator ─────────────────────────────────────────────────────
// Walks an expression tree against a Context. Binary chains are
// evaluated iteratively down their left spine so that long sums like
// 1+1+…+1 use constant stack; everything else recurses normally.

import type { BinaryOperator, Call, Expr } from "./ast";
import type { Context } from "./context";
import {
  ArgumentMismatchError,
  UndefinedVariableError,
  UnknownFunctionError,
  isEngineError,
  type EngineError,
} from "./errors";
import { parse } from "./parser";
import { FunctionRegistry } from "./registry";
import {
  add,
  divide,
  factorial,
  integer,
  multiply,
  negate,
  power,
  remainder,
  subtract,
  type Numeric,
} from "../numeric/index";

export interface EvalOptions {
  /** Primitives consulted when no user function matches a call. */
  readonly registry?: FunctionRegistry;
}

export type EvalOutcome =
  | { readonly ok: true; readonly value: Numeric }
  | { readonly ok: false; readonly error: EngineError };

const EMPTY_REGISTRY = new FunctionRegistry();

const BINARY_OPERATIONS: Readonly<
  Record<BinaryOperator, (a: Numeric, b: Numeric) => Numeric>
> = {
  Add: add,
  Sub: subtract,
  Mul: multiply,
  Div: divide,
  Mod: remainder,
  Pow: power,
};

class Evaluator {
  constructor(
    private readonly context: Context,
    private readonly registry: FunctionRegistry
  ) {}

  evaluate(expr: Expr): Numeric {
    switch (expr.kind) {
      case "Literal":
        return expr.value;

      case "Variable": {
        const value = this.context.getVariable(expr.name);
        if (value === undefined) {
          throw new UndefinedVariableError(expr.name);
        }
        return value;
      }

      case "Binary":
        return this.evaluateChain(expr);

      case "Unary": {
        const operand = this.evaluate(expr.operand);
        return expr.op === "Negate" ? negate(operand) : factorial(operand);
      }

      case "Assign": {
        const value = this.evaluate(expr.value);
        this.context.setVariable(expr.name, value);
        return value;
      }

      case "FunctionDef":
        this.context.defineFunction(expr.name, {
          params: expr.params,
          body: expr.body,
        });
        return integer(0);

      case "Call":
        return this.evaluateCall(expr);
    }
  }

  /**
   * Collects (operator, right operand) pairs down the left spine, then
   * applies them from the bottom up. Order of evaluation is the same as
   * plain recursion: leftmost leaf first, then each right operand.
   */
  private evaluateChain(root: Expr): Numeric {
    const pending: { op: BinaryOperator; right: Expr }[] = [];
    let node = root;
    while (node.kind === "Binary") {
      pending.push({ op: node.op, right: node.right });
      node = node.left;
    }

    let result = this.evaluate(node);
    for (let i = pending.length - 1; i >= 0; i--) {
      const { op, right } = pending[i]!;
      result = BINARY_OPERATIONS[op](result, this.evaluate(right));
    }
    return result;
  }

  private evaluateCall(call: Call): Numeric {
    // Arguments first: one of them may (re)define the callee
    const args = call.args.map((arg) => this.evaluate(arg));
    const fn = this.context.getFunction(call.name);

    if (fn) {
      if (args.length !== fn.params.length) {
        throw new ArgumentMismatchError(call.name, fn.params.length);
      }
      this.context.pushScope();
      try {
        fn.params.forEach((param, index) => {
          this.context.defineVariable(param, args[index]!);
        });
        return this.evaluate(fn.body);
      } finally {
        this.context.popScope();
      }
    }

    const primitive = this.registry.get(call.name);
    if (!primitive) {
      throw new UnknownFunctionError(call.name);
    }
    return primitive(args);
  }
}

// ─── Public API ────────────────────────────────────────────────────

/**
 * Evaluates a parsed expression, mutating the context for assignments
 * and function definitions.
 *
 * @throws {EngineError} on the first failure; scopes pushed for calls
 *   are always popped before the error propagates.
 */
export function evaluateExpr(
  expr: Expr,
  context: Context,
  options: EvalOptions = {}
): Numeric {
  const evaluator = new Evaluator(context, options.registry ?? EMPTY_REGISTRY);
  return evaluator.evaluate(expr);
}

/**
 * Parses and evaluates source text.
 *
 * @throws {EngineError} for syntax and evaluation errors alike.
 */
export function evaluate(
  text: string,
  context: Context,
  options: EvalOptions = {}
): Numeric {
  return evaluateExpr(parse(text), context, options);
}

/** Like `evaluate`, but reports engine errors as a value. */
export function tryEvaluate(
  text: string,
  context: Context,
  options: EvalOptions = {}
): EvalOutcome {
  try {
    return { ok: true, value: evaluate(text, context, options) };
  } catch (error) {
    if (isEngineError(error)) return { ok: false, error };
    throw error;
  }
}

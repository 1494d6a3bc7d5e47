// ─── AST Node Types ────────────────────────────────────────────────
// Discriminated union on `kind`. Every node owns its children; trees
// are never shared or cyclic.

import type { Numeric } from "../numeric/index";

export type BinaryOperator = "Add" | "Sub" | "Mul" | "Div" | "Mod" | "Pow";

export type UnaryOperator = "Negate" | "Factorial";

export interface Literal {
  readonly kind: "Literal";
  readonly value: Numeric;
}

export interface Variable {
  readonly kind: "Variable";
  readonly name: string;
}

export interface Binary {
  readonly kind: "Binary";
  readonly op: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
}

export interface Unary {
  readonly kind: "Unary";
  readonly op: UnaryOperator;
  readonly operand: Expr;
}

export interface Call {
  readonly kind: "Call";
  readonly name: string;
  readonly args: readonly Expr[];
}

export interface Assign {
  readonly kind: "Assign";
  readonly name: string;
  readonly value: Expr;
}

export interface FunctionDef {
  readonly kind: "FunctionDef";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: Expr;
}

export type Expr =
  | Literal
  | Variable
  | Binary
  | Unary
  | Call
  | Assign
  | FunctionDef;

export const BINARY_SYMBOLS: Readonly<Record<BinaryOperator, string>> = {
  Add: "+",
  Sub: "-",
  Mul: "*",
  Div: "/",
  Mod: "%",
  Pow: "^",
};

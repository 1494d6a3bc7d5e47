// ─── Parser ────────────────────────────────────────────────────────
// Pratt (operator-precedence) parser with one token of lookahead.
// Binding powers, low → high:
//   + -  (1, 2)  →  * / % and implicit multiplication  (3, 4)
//   →  ^  (6, 5, right-assoc)  →  prefix -  (_, 9)  →  postfix !  (11, _)

import type { Binary, BinaryOperator, Expr } from "./ast";
import { BINARY_SYMBOLS } from "./ast";
import { ParseError } from "./errors";
import { Lexer, describeToken, type Token, type TokenKind } from "./lexer";
import { float, integer, type Numeric } from "../numeric/index";

interface InfixRule {
  readonly left: number;
  readonly right: number;
  readonly op: BinaryOperator;
}

const INFIX_RULES: ReadonlyMap<TokenKind, InfixRule> = new Map([
  ["Plus", { left: 1, right: 2, op: "Add" }],
  ["Minus", { left: 1, right: 2, op: "Sub" }],
  ["Star", { left: 3, right: 4, op: "Mul" }],
  ["Slash", { left: 3, right: 4, op: "Div" }],
  ["Percent", { left: 3, right: 4, op: "Mod" }],
  // Left bp above right bp makes ^ right-associative: 2^3^4 = 2^(3^4)
  ["Caret", { left: 6, right: 5, op: "Pow" }],
]);

/** Synthesized when a term is directly followed by `(` or an identifier. */
const IMPLICIT_MULTIPLY: InfixRule = { left: 3, right: 4, op: "Mul" };

const PREFIX_NEGATE_BP = 9;
const POSTFIX_FACTORIAL_BP = 11;

class Parser {
  private current: Token;

  constructor(private readonly lexer: Lexer) {
    this.current = lexer.next();
  }

  /** Returns the current token and moves the lookahead forward. */
  private advance(): Token {
    const token = this.current;
    this.current = this.lexer.next();
    return token;
  }

  private error(detail: string, token: Token = this.current): ParseError {
    return new ParseError(detail, token.position);
  }

  parseExpression(minBp: number): Expr {
    let lhs = this.parsePrefix();

    for (;;) {
      const token = this.current;
      if (token.kind === "EOF") break;

      if (token.kind === "Bang") {
        if (POSTFIX_FACTORIAL_BP < minBp) break;
        this.advance();
        lhs = { kind: "Unary", op: "Factorial", operand: lhs };
        continue;
      }

      const explicit = INFIX_RULES.get(token.kind);
      const rule =
        explicit ??
        (token.kind === "LParen" || token.kind === "Identifier"
          ? IMPLICIT_MULTIPLY
          : undefined);
      if (!rule || rule.left < minBp) break;

      // Implicit multiplication consumes no token
      if (explicit) this.advance();

      const rhs = this.parseExpression(rule.right);
      lhs = { kind: "Binary", op: rule.op, left: lhs, right: rhs };
    }

    return lhs;
  }

  private parsePrefix(): Expr {
    const token = this.advance();

    switch (token.kind) {
      case "Float":
        return { kind: "Literal", value: float(token.value) };

      case "Integer":
        return { kind: "Literal", value: integer(token.value) };

      case "Identifier":
        return this.parseIdentifier(token.name);

      case "LParen": {
        const inner = this.parseExpression(0);
        if (this.current.kind !== "RParen") {
          throw this.error(`Expected ')' but found ${describeToken(this.current)}`);
        }
        this.advance();
        return inner;
      }

      case "Minus":
        return {
          kind: "Unary",
          op: "Negate",
          operand: this.parseExpression(PREFIX_NEGATE_BP),
        };

      case "EOF":
        throw this.error("Unexpected end of input", token);

      default:
        throw this.error(`Unexpected ${describeToken(token)}`, token);
    }
  }

  /**
   * `name(args) = body` defines a function, `name(args)` calls one,
   * `name = expr` assigns, and a bare `name` reads a variable.
   */
  private parseIdentifier(name: string): Expr {
    if (this.current.kind === "LParen") {
      this.advance();
      const args = this.parseArguments();

      if (this.current.kind !== "Equals") {
        return { kind: "Call", name, args };
      }

      const equals = this.advance();
      const params: string[] = [];
      for (const arg of args) {
        if (arg.kind !== "Variable") {
          throw this.error("Function parameters must be identifiers", equals);
        }
        params.push(arg.name);
      }
      const body = this.parseExpression(0);
      return { kind: "FunctionDef", name, params, body };
    }

    if (this.current.kind === "Equals") {
      this.advance();
      return { kind: "Assign", name, value: this.parseExpression(0) };
    }

    return { kind: "Variable", name };
  }

  /** Parses `a, b, c)`. The opening parenthesis is already consumed. */
  private parseArguments(): Expr[] {
    const args: Expr[] = [];
    if (this.current.kind === "RParen") {
      this.advance();
      return args;
    }

    for (;;) {
      args.push(this.parseExpression(0));

      if (this.current.kind === "Comma") {
        this.advance();
        continue;
      }
      if (this.current.kind === "RParen") {
        this.advance();
        return args;
      }
      throw this.error(
        `Expected ',' or ')' in argument list but found ${describeToken(this.current)}`
      );
    }
  }

  /** The top-level parse must consume every token up to end of input. */
  expectEnd(): void {
    if (this.current.kind !== "EOF") {
      throw this.error(
        `Unexpected ${describeToken(this.current)} after end of expression`
      );
    }
  }
}

/**
 * Parses source text into an expression tree.
 * Has no side effects and yields no partial tree on failure.
 *
 * @throws {ParseError} on any syntax error.
 */
export function parse(source: string): Expr {
  const parser = new Parser(new Lexer(source));
  const expr = parser.parseExpression(0);
  parser.expectEnd();
  return expr;
}

// ─── Printer ───────────────────────────────────────────────────────

function formatLiteral(value: Numeric): string {
  switch (value.kind) {
    case "integer":
      return value.value < 0n ? `(${value.value})` : String(value.value);
    case "float": {
      // Only overflowing literals such as 1e999 lex to Infinity
      if (value.value === Infinity) return "1e999";
      const text = String(value.value);
      // Keep a decimal point so the text lexes back as a Float
      return /[.eE]/.test(text) || !Number.isFinite(value.value)
        ? text
        : `${text}.0`;
    }
    case "rational":
      return `(${value.value.numerator}/${value.value.denominator})`;
    case "complex":
      return `(${value.value.toString()})`;
  }
}

/**
 * Renders a tree as fully parenthesized source text. For trees produced
 * by `parse`, parsing the output yields an identical tree. Nesting depth
 * grows with the tree, so prefer `formatSource` for long chains.
 */
export function formatExpr(expr: Expr): string {
  switch (expr.kind) {
    case "Literal":
      return formatLiteral(expr.value);
    case "Variable":
      return expr.name;
    case "Binary":
      return `(${formatExpr(expr.left)} ${BINARY_SYMBOLS[expr.op]} ${formatExpr(expr.right)})`;
    case "Unary":
      return expr.op === "Negate"
        ? `(-${formatExpr(expr.operand)})`
        : `(${formatExpr(expr.operand)}!)`;
    case "Call":
      return `${expr.name}(${expr.args.map(formatExpr).join(", ")})`;
    case "Assign":
      return `(${expr.name} = ${formatExpr(expr.value)})`;
    case "FunctionDef":
      return `(${expr.name}(${expr.params.join(", ")}) = ${formatExpr(expr.body)})`;
  }
}

const PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  Add: 1,
  Sub: 1,
  Mul: 3,
  Div: 3,
  Mod: 3,
  Pow: 5,
};

function isDefinition(expr: Expr): boolean {
  return expr.kind === "Assign" || expr.kind === "FunctionDef";
}

function wrapIf(expr: Expr, wrap: boolean): string {
  const text = formatSource(expr);
  return wrap ? `(${text})` : text;
}

function needsLeftParens(op: BinaryOperator, left: Expr): boolean {
  if (left.kind !== "Binary") return isDefinition(left);
  // ^ is right-associative, so any binary on its left is grouped
  return op === "Pow" || PRECEDENCE[left.op] < PRECEDENCE[op];
}

function needsRightParens(op: BinaryOperator, right: Expr): boolean {
  if (right.kind !== "Binary") return isDefinition(right);
  return op === "Pow"
    ? PRECEDENCE[right.op] < PRECEDENCE.Pow
    : PRECEDENCE[right.op] <= PRECEDENCE[op];
}

/** Walks the left spine iteratively, like the evaluator does. */
function formatChain(root: Binary): string {
  const parts: string[] = [];
  let node: Binary = root;
  for (;;) {
    parts.push(
      `${BINARY_SYMBOLS[node.op]} ${wrapIf(node.right, needsRightParens(node.op, node.right))}`
    );
    const left = node.left;
    if (left.kind === "Binary" && !needsLeftParens(node.op, left)) {
      node = left;
      continue;
    }
    parts.push(wrapIf(left, needsLeftParens(node.op, left)));
    return parts.reverse().join(" ");
  }
}

/**
 * Renders a tree as source text with only the parentheses the grammar
 * needs. Left-associative chains print flat, so `parse` reads them back
 * without deep recursion. For trees produced by `parse`, parsing the
 * output yields an identical tree.
 */
export function formatSource(expr: Expr): string {
  switch (expr.kind) {
    case "Literal":
      return formatLiteral(expr.value);
    case "Variable":
      return expr.name;
    case "Binary":
      return formatChain(expr);
    case "Unary": {
      const { operand } = expr;
      if (expr.op === "Negate") {
        return `-${wrapIf(operand, operand.kind === "Binary" || isDefinition(operand))}`;
      }
      // -x! reads as -(x!), so a negated operand needs grouping
      const wrap =
        operand.kind === "Binary" ||
        (operand.kind === "Unary" && operand.op === "Negate") ||
        isDefinition(operand);
      return `${wrapIf(operand, wrap)}!`;
    }
    case "Call":
      return `${expr.name}(${expr.args.map(formatSource).join(", ")})`;
    case "Assign":
      return `${expr.name} = ${formatSource(expr.value)}`;
    case "FunctionDef":
      return `${expr.name}(${expr.params.join(", ")}) = ${formatSource(expr.body)}`;
  }
}

// ─── Lexer ─────────────────────────────────────────────────────────
// Turns source text into tokens on demand. The parser pulls one token
// at a time, so only a single token of lookahead ever exists.
// Pure: lexing the same text always yields the same sequence.

export type PunctuationKind =
  | "Plus"
  | "Minus"
  | "Star"
  | "Slash"
  | "Caret"
  | "Percent"
  | "Bang"
  | "LParen"
  | "RParen"
  | "Comma"
  | "Equals";

export type Token =
  | { readonly kind: PunctuationKind; readonly position: number }
  | { readonly kind: "Float"; readonly value: number; readonly position: number }
  | { readonly kind: "Integer"; readonly value: bigint; readonly position: number }
  | { readonly kind: "Identifier"; readonly name: string; readonly position: number }
  | { readonly kind: "EOF"; readonly position: number }
  | { readonly kind: "Error"; readonly text: string; readonly position: number };

export type TokenKind = Token["kind"];

const PUNCTUATION: ReadonlyMap<string, PunctuationKind> = new Map([
  ["+", "Plus"],
  ["-", "Minus"],
  ["*", "Star"],
  ["/", "Slash"],
  ["^", "Caret"],
  ["%", "Percent"],
  ["!", "Bang"],
  ["(", "LParen"],
  [")", "RParen"],
  [",", "Comma"],
  ["=", "Equals"],
]);

const PUNCTUATION_SYMBOLS: Readonly<Record<PunctuationKind, string>> = {
  Plus: "+",
  Minus: "-",
  Star: "*",
  Slash: "/",
  Caret: "^",
  Percent: "%",
  Bang: "!",
  LParen: "(",
  RParen: ")",
  Comma: ",",
  Equals: "=",
};

const WHITESPACE = new Set([" ", "\t", "\n", "\r", "\f", "\v"]);

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F");
}

function isBinaryDigit(ch: string): boolean {
  return ch === "0" || ch === "1";
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isIdentContinue(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch) || ch === "_";
}

/** Renders a token for diagnostics, e.g. `'+'`, `identifier 'x'`. */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case "Float":
    case "Integer":
      return `number '${token.value}'`;
    case "Identifier":
      return `identifier '${token.name}'`;
    case "EOF":
      return "end of input";
    case "Error":
      return `unrecognized character '${token.text}'`;
    default:
      return `'${PUNCTUATION_SYMBOLS[token.kind]}'`;
  }
}

/**
 * Lazy token producer over a source string.
 * Once input is exhausted every further call returns EOF.
 */
export class Lexer {
  private pos = 0;

  constructor(private readonly source: string) {}

  next(): Token {
    this.skipWhitespace();

    const start = this.pos;
    if (start >= this.source.length) {
      return { kind: "EOF", position: start };
    }

    const ch = this.charAt(start);

    if (isDigit(ch)) {
      return this.readNumber();
    }

    if (isIdentStart(ch)) {
      while (isIdentContinue(this.charAt(this.pos))) {
        this.pos++;
      }
      return {
        kind: "Identifier",
        name: this.source.slice(start, this.pos),
        position: start,
      };
    }

    this.pos++;
    const punctuation = PUNCTUATION.get(ch);
    if (punctuation) {
      return { kind: punctuation, position: start };
    }
    return { kind: "Error", text: ch, position: start };
  }

  private charAt(index: number): string {
    return this.source.charAt(index);
  }

  private skipWhitespace(): void {
    while (WHITESPACE.has(this.charAt(this.pos))) {
      this.pos++;
    }
  }

  /** Length of the digit run starting at `from` that satisfies `accept`. */
  private runLength(from: number, accept: (ch: string) => boolean): number {
    let end = from;
    while (end < this.source.length && accept(this.charAt(end))) {
      end++;
    }
    return end - from;
  }

  /** Length of an exponent part (`e`, optional sign, digits) at `from`, or 0. */
  private exponentLength(from: number): number {
    const marker = this.charAt(from);
    if (marker !== "e" && marker !== "E") return 0;
    let cursor = from + 1;
    const sign = this.charAt(cursor);
    if (sign === "+" || sign === "-") cursor++;
    const digits = this.runLength(cursor, isDigit);
    return digits === 0 ? 0 : cursor + digits - from;
  }

  private readNumber(): Token {
    const start = this.pos;

    // Prefixed forms: `0x` hex and `0b` binary, when at least one digit follows.
    if (this.charAt(start) === "0") {
      const prefix = this.charAt(start + 1);
      const accept =
        prefix === "x" ? isHexDigit : prefix === "b" ? isBinaryDigit : null;
      if (accept) {
        const digits = this.runLength(start + 2, accept);
        if (digits > 0) {
          this.pos = start + 2 + digits;
          return {
            kind: "Integer",
            value: BigInt(this.source.slice(start, this.pos)),
            position: start,
          };
        }
      }
    }

    this.pos += this.runLength(start, isDigit);
    let isFloat = false;

    if (this.charAt(this.pos) === ".") {
      isFloat = true;
      this.pos++;
      this.pos += this.runLength(this.pos, isDigit);
    }

    const exponent = this.exponentLength(this.pos);
    if (exponent > 0) {
      isFloat = true;
      this.pos += exponent;
    }

    const text = this.source.slice(start, this.pos);
    if (isFloat) {
      return { kind: "Float", value: Number(text), position: start };
    }
    return { kind: "Integer", value: BigInt(text), position: start };
  }
}

/**
 * Lexes the whole input eagerly, including the trailing EOF token.
 * Used for diagnostics and tests; the parser consumes a Lexer directly.
 */
export function tokenize(source: string): readonly Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.next();
    tokens.push(token);
    if (token.kind === "EOF") return tokens;
  }
}

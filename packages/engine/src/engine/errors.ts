// ─── Engine Errors ─────────────────────────────────────────────────
// Every failure the engine reports is an EngineError. Parsing and
// evaluation are fail-fast: the first error aborts and is thrown to
// the caller, with no partial tree or partial result.

export type EngineErrorKind =
  | "DivisionByZero"
  | "UndefinedVariable"
  | "ArgumentMismatch"
  | "UnknownFunction"
  | "TypeMismatch"
  | "ParseError"
  | "DomainError"
  | "Generic";

/** Base class for all errors raised by the parser, evaluator and primitives. */
export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Reserved. Zero divisors on the arithmetic path produce IEEE
 * infinities or NaN instead of raising this.
 */
export class DivisionByZeroError extends EngineError {
  readonly kind = "DivisionByZero";

  constructor() {
    super("Division by zero");
  }
}

export class UndefinedVariableError extends EngineError {
  readonly kind = "UndefinedVariable";

  constructor(readonly variable: string) {
    super(`Undefined variable: ${variable}`);
  }
}

/** `variadic` marks `expected` as a minimum rather than an exact count. */
export class ArgumentMismatchError extends EngineError {
  readonly kind = "ArgumentMismatch";

  constructor(
    readonly functionName: string,
    readonly expected: number,
    readonly variadic = false
  ) {
    super(
      `Function '${functionName}' requires ${variadic ? "at least" : "exactly"} ${expected} argument(s)`
    );
  }
}

export class UnknownFunctionError extends EngineError {
  readonly kind = "UnknownFunction";

  constructor(readonly functionName: string) {
    super(`Function '${functionName}' is not known`);
  }
}

export class TypeMismatchError extends EngineError {
  readonly kind = "TypeMismatch";

  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Type mismatch: expected ${expected}, got ${actual}`);
  }
}

/** Syntax error. `position` is the source offset of the offending token. */
export class ParseError extends EngineError {
  readonly kind = "ParseError";

  constructor(
    readonly detail: string,
    readonly position?: number
  ) {
    super(
      position === undefined
        ? `Parser error: ${detail}`
        : `Parser error at position ${position}: ${detail}`
    );
  }
}

export class DomainError extends EngineError {
  readonly kind = "DomainError";
}

/** Catch-all for primitive-specific failures. */
export class GenericEngineError extends EngineError {
  readonly kind = "Generic";
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

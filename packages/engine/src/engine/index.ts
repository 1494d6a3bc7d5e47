export type {
  Expr,
  Literal,
  Variable,
  Binary,
  Unary,
  Call,
  Assign,
  FunctionDef,
  BinaryOperator,
  UnaryOperator,
} from "./ast";
export { BINARY_SYMBOLS } from "./ast";
export { Lexer, tokenize, describeToken, type Token, type TokenKind } from "./lexer";
export { parse, formatExpr, formatSource } from "./parser";
export { Context, type UserFunction } from "./context";
export { FunctionRegistry, type PrimitiveFunction } from "./registry";
export {
  evaluate,
  evaluateExpr,
  tryEvaluate,
  type EvalOptions,
  type EvalOutcome,
} from "./evaluator";
export {
  EngineError,
  DivisionByZeroError,
  UndefinedVariableError,
  ArgumentMismatchError,
  UnknownFunctionError,
  TypeMismatchError,
  ParseError,
  DomainError,
  GenericEngineError,
  isEngineError,
  type EngineErrorKind,
} from "./errors";

// ─── Snapshot Schema ───────────────────────────────────────────────
// JSON-safe mirrors of numbers, expressions and contexts, with the
// Zod schemas that guard the way back in. Arbitrary-precision integers
// travel as decimal strings; non-finite floats as their names.

import { z } from "zod";
import {
  Context,
  ParseError,
  complex,
  float,
  formatSource,
  integer,
  parse,
  rational,
  type Expr,
  type Numeric,
} from "@tally/engine";
import { formatZodIssues } from "./format-zod-issues";

/** Raised when stored data does not match the snapshot schema. */
export class SnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SnapshotError";
  }
}

// ─── Numbers ───────────────────────────────────────────────────────

const IntegerText = z.string().regex(/^-?\d+$/, "Expected an integer literal");

const FloatSnapshotSchema = z.union([
  z.number(),
  z.enum(["NaN", "Infinity", "-Infinity"]),
]);

export type FloatSnapshot = z.infer<typeof FloatSnapshotSchema>;

export const NumericSnapshotSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("integer"), value: IntegerText }),
  z.object({
    kind: z.literal("rational"),
    numerator: IntegerText,
    denominator: z.string().regex(/^[1-9]\d*$/, "Expected a positive integer"),
  }),
  z.object({ kind: z.literal("float"), value: FloatSnapshotSchema }),
  z.object({
    kind: z.literal("complex"),
    re: FloatSnapshotSchema,
    im: FloatSnapshotSchema,
  }),
]);

export type NumericSnapshot = z.infer<typeof NumericSnapshotSchema>;

function encodeFloat(value: number): FloatSnapshot {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  return value;
}

function decodeFloat(value: FloatSnapshot): number {
  return typeof value === "number" ? value : Number(value);
}

export function encodeNumeric(n: Numeric): NumericSnapshot {
  switch (n.kind) {
    case "integer":
      return { kind: "integer", value: n.value.toString() };
    case "rational":
      return {
        kind: "rational",
        numerator: n.value.numerator.toString(),
        denominator: n.value.denominator.toString(),
      };
    case "float":
      return { kind: "float", value: encodeFloat(n.value) };
    case "complex":
      return {
        kind: "complex",
        re: encodeFloat(n.value.re),
        im: encodeFloat(n.value.im),
      };
  }
}

export function decodeNumeric(snapshot: NumericSnapshot): Numeric {
  switch (snapshot.kind) {
    case "integer":
      return integer(BigInt(snapshot.value));
    case "rational":
      return rational(BigInt(snapshot.numerator), BigInt(snapshot.denominator));
    case "float":
      return float(decodeFloat(snapshot.value));
    case "complex":
      return complex(decodeFloat(snapshot.re), decodeFloat(snapshot.im));
  }
}

// ─── Expressions ───────────────────────────────────────────────────
// Function bodies are stored as source text. `formatSource` prints
// left-associative chains flat, so a long body neither nests deeply in
// JSON nor recurses deeply on the way back through `parse`.

export type ExprSnapshot = string;

const Name = z.string().min(1);

export const ExprSnapshotSchema = z.string().superRefine((source, ctx) => {
  try {
    parse(source);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
  }
});

export function encodeExpr(expr: Expr): ExprSnapshot {
  return formatSource(expr);
}

/** @throws {SnapshotError} if `snapshot` is not valid source text. */
export function decodeExpr(snapshot: ExprSnapshot): Expr {
  try {
    return parse(snapshot);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new SnapshotError(`Unreadable expression "${snapshot}": ${error.message}`);
    }
    throw error;
  }
}

// ─── Contexts ──────────────────────────────────────────────────────
// Only the global scope is captured: call scopes never outlive an
// evaluation.

export const ContextSnapshotSchema = z.object({
  variables: z.array(z.object({ name: Name, value: NumericSnapshotSchema })),
  functions: z.array(
    z.object({
      name: Name,
      params: z.array(Name),
      body: ExprSnapshotSchema,
    })
  ),
});

export type ContextSnapshot = z.infer<typeof ContextSnapshotSchema>;

export function encodeContext(context: Context): ContextSnapshot {
  const variables = Array.from(context.globals(), ([name, value]) => ({
    name,
    value: encodeNumeric(value),
  }));

  const functions: ContextSnapshot["functions"] = [];
  for (const name of context.functionNames()) {
    const fn = context.getFunction(name);
    if (!fn) continue;
    functions.push({ name, params: [...fn.params], body: encodeExpr(fn.body) });
  }

  return { variables, functions };
}

export function decodeContext(snapshot: ContextSnapshot): Context {
  const context = new Context();
  for (const { name, value } of snapshot.variables) {
    context.defineVariable(name, decodeNumeric(value));
  }
  for (const { name, params, body } of snapshot.functions) {
    context.defineFunction(name, { params, body: decodeExpr(body) });
  }
  return context;
}

// ─── Sessions ──────────────────────────────────────────────────────

export const HistoryEntrySchema = z.object({
  expression: z.string(),
  result: z.string(),
  timestamp: z.number().int().nonnegative(),
  isError: z.boolean(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const SessionSnapshotSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  history: z.array(HistoryEntrySchema),
  context: ContextSnapshotSchema,
  buffer: z.string(),
  lastResult: z.string().nullable(),
  mode: z.string().min(1),
});

export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

export const ManagerSnapshotSchema = z
  .object({
    sessions: z.array(SessionSnapshotSchema).min(1),
    currentSessionId: z.string().min(1),
    showFractions: z.boolean(),
  })
  .refine(
    (m) => m.sessions.some((s) => s.id === m.currentSessionId),
    { message: "currentSessionId must name one of the sessions", path: ["currentSessionId"] }
  );

export type ManagerSnapshot = z.infer<typeof ManagerSnapshotSchema>;

// ─── Parse Boundary ────────────────────────────────────────────────

function parseWith<T>(schema: z.ZodType<T>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SnapshotError(formatZodIssues(result.error.issues));
  }
  return result.data;
}

/** @throws {SnapshotError} if `raw` is not a valid session snapshot. */
export function parseSessionSnapshot(raw: unknown): SessionSnapshot {
  return parseWith(SessionSnapshotSchema, raw);
}

/** @throws {SnapshotError} if `raw` is not a valid manager snapshot. */
export function parseManagerSnapshot(raw: unknown): ManagerSnapshot {
  return parseWith(ManagerSnapshotSchema, raw);
}

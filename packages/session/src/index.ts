// ─── @tally/session ────────────────────────────────────────────────
// Calculator sessions on top of the engine: input buffers, history,
// per-session contexts and SQLite persistence of all of it.

export {
  SessionManager,
  type SessionOverview,
} from "./session-manager";
export {
  parseSessionOptions,
  SessionManagerOptionsSchema,
  type SessionManagerOptions,
  type SessionManagerOptionsInput,
} from "./options";
export {
  SnapshotError,
  NumericSnapshotSchema,
  ExprSnapshotSchema,
  ContextSnapshotSchema,
  HistoryEntrySchema,
  SessionSnapshotSchema,
  ManagerSnapshotSchema,
  encodeNumeric,
  decodeNumeric,
  encodeExpr,
  decodeExpr,
  encodeContext,
  decodeContext,
  parseSessionSnapshot,
  parseManagerSnapshot,
  type FloatSnapshot,
  type NumericSnapshot,
  type ExprSnapshot,
  type ContextSnapshot,
  type HistoryEntry,
  type SessionSnapshot,
  type ManagerSnapshot,
} from "./schema/snapshot";
export { formatZodIssues } from "./schema/format-zod-issues";
export * from "./storage/index";

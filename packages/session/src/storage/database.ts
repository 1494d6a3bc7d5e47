// ─── Database Interface ────────────────────────────────────────────
// The slice of a synchronous SQLite driver the storage layer needs.
// `openSqliteDatabase` adapts sql.js; tests pass a mock.

export type SqlValue = string | number | Uint8Array | null;

export interface QueryResult {
  readonly rows: readonly Record<string, unknown>[];
  readonly rowsAffected: number;
}

export interface SqlExecutor {
  execute(sql: string, params?: readonly SqlValue[]): QueryResult;
}

export interface SqlDatabase extends SqlExecutor {
  /** Runs `fn` atomically; a throw rolls every statement back. */
  transaction(fn: (tx: SqlExecutor) => void): void;
}

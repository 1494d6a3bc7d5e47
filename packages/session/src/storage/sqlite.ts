// ─── SQLite Adapter ────────────────────────────────────────────────
// Wraps a sql.js (SQLite compiled to WebAssembly) database in the
// SqlDatabase interface. sql.js keeps the whole database in memory, so a
// file-backed database is read once on open and written back after each
// committed write.

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import initSqlJs, { type Database } from "sql.js";
import type { QueryResult, SqlDatabase, SqlExecutor, SqlValue } from "./database";

const MEMORY = ":memory:";

export interface SqliteDatabase extends SqlDatabase {
  close(): void;
}

interface RunResult extends QueryResult {
  readonly isReader: boolean;
}

function run(db: Database, sql: string, params: readonly SqlValue[]): RunResult {
  const stmt = db.prepare(sql);
  try {
    if (params.length > 0) stmt.bind([...params]);
    const isReader = stmt.getColumnNames().length > 0;
    const rows: Record<string, unknown>[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return { rows, rowsAffected: isReader ? 0 : db.getRowsModified(), isReader };
  } finally {
    stmt.free();
  }
}

/**
 * Opens (or creates) a database file. Pass ":memory:" (the default) for a
 * throwaway in-memory database.
 */
export async function openSqliteDatabase(filename: string = MEMORY): Promise<SqliteDatabase> {
  const SQL = await initSqlJs();
  const inMemory = filename === MEMORY;
  const db = new SQL.Database(!inMemory && existsSync(filename) ? readFileSync(filename) : null);

  const persist = (): void => {
    if (!inMemory) writeFileSync(filename, db.export());
  };

  const tx: SqlExecutor = {
    execute: (sql: string, params: readonly SqlValue[] = []) => run(db, sql, params),
  };

  return {
    execute(sql: string, params: readonly SqlValue[] = []): QueryResult {
      const { isReader, ...result } = run(db, sql, params);
      if (!isReader) persist();
      return result;
    },
    transaction(fn: (tx: SqlExecutor) => void): void {
      db.run("BEGIN");
      try {
        fn(tx);
      } catch (error) {
        db.run("ROLLBACK");
        throw error;
      }
      db.run("COMMIT");
      persist();
    },
    close(): void {
      persist();
      db.close();
    },
  };
}

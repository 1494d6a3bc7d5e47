// ─── SQLite Migrations ─────────────────────────────────────────────
// Versioned schema for the session database. Applied versions are
// recorded in `_migrations`, so running twice is a no-op.

import type { SqlDatabase } from "./database";

export interface Migration {
  readonly version: number;
  readonly description: string;
  readonly sql: string;
}

/** All migrations in order. Append only. */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: "Create sessions table",
    sql: `
      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        position INTEGER NOT NULL,
        compressed_state BLOB NOT NULL,
        saved_at INTEGER NOT NULL
      );
    `,
  },
  {
    version: 2,
    description: "Create app state table",
    sql: `
      CREATE TABLE IF NOT EXISTS app_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `,
  },
];

function readVersion(row: Record<string, unknown> | undefined): number {
  const value = row?.["max_version"];
  return typeof value === "number" ? value : 0;
}

/**
 * Applies every migration newer than the database's current version,
 * each in its own transaction.
 */
export async function runMigrations(db: SqlDatabase): Promise<void> {
  db.execute(
    "CREATE TABLE IF NOT EXISTS _migrations (version INTEGER PRIMARY KEY, applied_at INTEGER NOT NULL)"
  );

  const result = db.execute("SELECT MAX(version) AS max_version FROM _migrations");
  const currentVersion = readVersion(result.rows[0]);

  for (const migration of MIGRATIONS) {
    if (migration.version <= currentVersion) continue;

    db.transaction((tx) => {
      // execute() prepares a single statement at a time
      const statements = migration.sql
        .split(";")
        .map((s) => s.trim())
        .filter((s) => s.length > 0);

      for (const statement of statements) {
        tx.execute(statement);
      }

      tx.execute("INSERT INTO _migrations (version, applied_at) VALUES (?, ?)", [
        migration.version,
        Date.now(),
      ]);
    });
  }
}

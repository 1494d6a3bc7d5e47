export type { SqlValue, QueryResult, SqlExecutor, SqlDatabase } from "./database";
export { MIGRATIONS, runMigrations, type Migration } from "./migrations";
export { SessionStore } from "./session-store";
export { openSqliteDatabase, type SqliteDatabase } from "./sqlite";

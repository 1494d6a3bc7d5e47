// ─── Session Store ─────────────────────────────────────────────────
// Persists calculator sessions and app-wide settings. Each session is
// stored as a gzip-compressed JSON snapshot, one row per session.

import pako from "pako";
import {
  parseSessionSnapshot,
  type ManagerSnapshot,
  type SessionSnapshot,
} from "../schema/snapshot";
import type { SqlDatabase } from "./database";

const CURRENT_SESSION_KEY = "current_session_id";
const SHOW_FRACTIONS_KEY = "show_fractions";

// ─── Internal Helpers ──────────────────────────────────────────────

function compressSession(session: SessionSnapshot): Uint8Array {
  return pako.gzip(JSON.stringify(session));
}

/** @throws {SnapshotError} or a decompression/JSON error on corrupt data. */
function decompressSession(blob: unknown): SessionSnapshot {
  if (!(blob instanceof Uint8Array)) {
    throw new TypeError("compressed_state is not a blob");
  }
  const json = pako.ungzip(blob, { to: "string" });
  const raw: unknown = JSON.parse(json);
  return parseSessionSnapshot(raw);
}

function readString(row: Record<string, unknown>, column: string): string | undefined {
  const value = row[column];
  return typeof value === "string" ? value : undefined;
}

/**
 * Stores the whole session manager in local SQLite. The schema must be
 * in place first (see `runMigrations`).
 */
export class SessionStore {
  constructor(private readonly db: SqlDatabase) {}

  /** Replaces everything stored with `snapshot`, atomically. */
  async saveManager(snapshot: ManagerSnapshot): Promise<void> {
    const now = Date.now();
    const rows = snapshot.sessions.map((session, position) => ({
      session,
      position,
      blob: compressSession(session),
    }));

    this.db.transaction((tx) => {
      tx.execute("DELETE FROM sessions");
      for (const { session, position, blob } of rows) {
        tx.execute(
          "INSERT INTO sessions (session_id, name, position, compressed_state, saved_at) VALUES (?, ?, ?, ?, ?)",
          [session.id, session.name, position, blob, now]
        );
      }
      tx.execute("INSERT OR REPLACE INTO app_state (key, value) VALUES (?, ?)", [
        CURRENT_SESSION_KEY,
        snapshot.currentSessionId,
      ]);
      tx.execute("INSERT OR REPLACE INTO app_state (key, value) VALUES (?, ?)", [
        SHOW_FRACTIONS_KEY,
        String(snapshot.showFractions),
      ]);
    });
  }

  /**
   * Loads the stored manager, or null when no readable session exists.
   * Sessions that fail to decode are skipped with a warning. A stale
   * current-session id falls back to the first session.
   */
  async loadManager(): Promise<ManagerSnapshot | null> {
    const result = this.db.execute(
      "SELECT session_id, compressed_state FROM sessions ORDER BY position ASC"
    );

    const sessions: SessionSnapshot[] = [];
    for (const row of result.rows) {
      try {
        sessions.push(decompressSession(row["compressed_state"]));
      } catch (error) {
        console.warn(
          `[SessionStore] Skipping unreadable session "${String(row["session_id"])}":`,
          error instanceof Error ? error.message : error
        );
      }
    }

    const first = sessions[0];
    if (!first) return null;

    const settings = new Map<string, string>();
    for (const row of this.db.execute("SELECT key, value FROM app_state").rows) {
      const key = readString(row, "key");
      const value = readString(row, "value");
      if (key !== undefined && value !== undefined) settings.set(key, value);
    }

    const storedId = settings.get(CURRENT_SESSION_KEY);
    const currentSessionId =
      storedId !== undefined && sessions.some((s) => s.id === storedId)
        ? storedId
        : first.id;

    return {
      sessions,
      currentSessionId,
      showFractions: settings.get(SHOW_FRACTIONS_KEY) === "true",
    };
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.db.execute("DELETE FROM sessions WHERE session_id = ?", [sessionId]);
  }

  async listSessionIds(): Promise<readonly string[]> {
    const result = this.db.execute(
      "SELECT session_id FROM sessions ORDER BY position ASC"
    );
    return result.rows.flatMap((row) => {
      const id = readString(row, "session_id");
      return id === undefined ? [] : [id];
    });
  }
}

import { describe, it, expect, vi, afterEach } from "vitest";
import pako from "pako";
import { SessionStore } from "./session-store.js";
import type { QueryResult, SqlExecutor, SqlValue } from "./database.js";
import type { ManagerSnapshot, SessionSnapshot } from "../schema/snapshot.js";

// ══════════════════════════════════════════════════════════════════════
// Mock DB Factory
// ══════════════════════════════════════════════════════════════════════

interface Statement {
  sql: string;
  params?: readonly SqlValue[];
}

interface MockTables {
  sessions?: Record<string, unknown>[];
  appState?: Record<string, unknown>[];
}

function makeMockDb(tables: MockTables = {}) {
  const executed: Statement[] = [];
  const transactionCalls: Statement[][] = [];
  let currentTxStatements: Statement[] | null = null;

  const execute = (sql: string, params?: readonly SqlValue[]): QueryResult => {
    const entry = { sql, params };
    if (currentTxStatements) {
      currentTxStatements.push(entry);
    } else {
      executed.push(entry);
    }

    if (sql.startsWith("SELECT") && sql.includes("FROM sessions")) {
      return { rows: tables.sessions ?? [], rowsAffected: 0 };
    }
    if (sql.startsWith("SELECT") && sql.includes("FROM app_state")) {
      return { rows: tables.appState ?? [], rowsAffected: 0 };
    }
    return { rows: [], rowsAffected: 1 };
  };

  const transaction = (fn: (tx: SqlExecutor) => void): void => {
    currentTxStatements = [];
    fn({ execute });
    transactionCalls.push(currentTxStatements);
    currentTxStatements = null;
  };

  return { execute, transaction, executed, transactionCalls };
}

// ══════════════════════════════════════════════════════════════════════
// Fixtures
// ══════════════════════════════════════════════════════════════════════

function makeSession(id: string, overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    id,
    name: `Session ${id}`,
    history: [],
    context: {
      variables: [{ name: "x", value: { kind: "integer", value: "5" } }],
      functions: [],
    },
    buffer: "0",
    lastResult: null,
    mode: "STANDARD",
    ...overrides,
  };
}

function makeManager(overrides: Partial<ManagerSnapshot> = {}): ManagerSnapshot {
  return {
    sessions: [makeSession("a"), makeSession("b")],
    currentSessionId: "b",
    showFractions: true,
    ...overrides,
  };
}

function compress(value: unknown): Uint8Array {
  return pako.gzip(JSON.stringify(value));
}

function makeSessionRow(session: SessionSnapshot): Record<string, unknown> {
  return { session_id: session.id, compressed_state: compress(session) };
}

function makeSettings(currentSessionId: string, showFractions: string) {
  return [
    { key: "current_session_id", value: currentSessionId },
    { key: "show_fractions", value: showFractions },
  ];
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ══════════════════════════════════════════════════════════════════════
// saveManager
// ══════════════════════════════════════════════════════════════════════

describe("SessionStore.saveManager", () => {
  it("rewrites every session and setting in one transaction", async () => {
    const db = makeMockDb();
    const store = new SessionStore(db);

    await store.saveManager(makeManager());

    expect(db.executed).toEqual([]);
    expect(db.transactionCalls).toHaveLength(1);

    const tx = db.transactionCalls[0] ?? [];
    expect(tx.map((s) => s.sql.split(" ").slice(0, 3).join(" "))).toEqual([
      "DELETE FROM sessions",
      "INSERT INTO sessions",
      "INSERT INTO sessions",
      "INSERT OR REPLACE",
      "INSERT OR REPLACE",
    ]);
    expect(tx[3]?.params).toEqual(["current_session_id", "b"]);
    expect(tx[4]?.params).toEqual(["show_fractions", "true"]);
  });

  it("stores sessions gzip-compressed with their position", async () => {
    const db = makeMockDb();
    const store = new SessionStore(db);
    const manager = makeManager();

    await store.saveManager(manager);

    const insert = db.transactionCalls[0]?.[2];
    const [id, name, position, blob] = insert?.params ?? [];
    expect([id, name, position]).toEqual(["b", "Session b", 1]);
    expect(blob).toBeInstanceOf(Uint8Array);

    const json = blob instanceof Uint8Array ? pako.ungzip(blob, { to: "string" }) : "";
    expect(JSON.parse(json)).toEqual(manager.sessions[1]);
  });
});

// ══════════════════════════════════════════════════════════════════════
// loadManager
// ══════════════════════════════════════════════════════════════════════

describe("SessionStore.loadManager", () => {
  it("returns null when nothing is stored", async () => {
    const store = new SessionStore(makeMockDb());
    expect(await store.loadManager()).toBeNull();
  });

  it("restores sessions in stored order with their settings", async () => {
    const manager = makeManager();
    const db = makeMockDb({
      sessions: manager.sessions.map(makeSessionRow),
      appState: makeSettings("b", "true"),
    });

    const loaded = await new SessionStore(db).loadManager();
    expect(loaded).toEqual(manager);
  });

  it("falls back to the first session for a stale current id", async () => {
    const db = makeMockDb({
      sessions: [makeSessionRow(makeSession("a"))],
      appState: makeSettings("gone", "false"),
    });

    const loaded = await new SessionStore(db).loadManager();
    expect(loaded?.currentSessionId).toBe("a");
    expect(loaded?.showFractions).toBe(false);
  });

  it("defaults settings when app_state is empty", async () => {
    const db = makeMockDb({ sessions: [makeSessionRow(makeSession("a"))] });

    const loaded = await new SessionStore(db).loadManager();
    expect(loaded?.currentSessionId).toBe("a");
    expect(loaded?.showFractions).toBe(false);
  });

  it("skips unreadable sessions with a warning", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const db = makeMockDb({
      sessions: [
        { session_id: "broken", compressed_state: new Uint8Array([1, 2, 3]) },
        { session_id: "invalid", compressed_state: compress({ id: "invalid" }) },
        makeSessionRow(makeSession("ok")),
      ],
      appState: makeSettings("ok", "false"),
    });

    const loaded = await new SessionStore(db).loadManager();

    expect(loaded?.sessions.map((s) => s.id)).toEqual(["ok"]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0]?.[0]).toBe('[SessionStore] Skipping unreadable session "broken":');
    expect(warn.mock.calls[1]?.[0]).toBe('[SessionStore] Skipping unreadable session "invalid":');
  });

  it("returns null when every session is unreadable", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const db = makeMockDb({
      sessions: [{ session_id: "text", compressed_state: "not a blob" }],
    });

    expect(await new SessionStore(db).loadManager()).toBeNull();
  });
});

// ══════════════════════════════════════════════════════════════════════
// deleteSession / listSessionIds
// ══════════════════════════════════════════════════════════════════════

describe("SessionStore.deleteSession", () => {
  it("deletes by id", async () => {
    const db = makeMockDb();
    await new SessionStore(db).deleteSession("a");

    expect(db.executed).toEqual([
      { sql: "DELETE FROM sessions WHERE session_id = ?", params: ["a"] },
    ]);
  });
});

describe("SessionStore.listSessionIds", () => {
  it("returns ids in stored order", async () => {
    const db = makeMockDb({
      sessions: [{ session_id: "a" }, { session_id: "b" }, { session_id: 3 }],
    });

    expect(await new SessionStore(db).listSessionIds()).toEqual(["a", "b"]);
  });
});

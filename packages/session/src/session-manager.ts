// ─── Session Manager ───────────────────────────────────────────────
// Calculator sessions as the UI sees them: each session owns an input
// buffer, a history and its own evaluation Context. All sessions share
// one FunctionRegistry. Persistence is explicit via save()/restore().

import { randomUUID } from "node:crypto";
import {
  Context,
  formatInteger,
  formatNumber,
  formatNumberDecimal,
  tryEvaluate,
  type FunctionRegistry,
  type Radix,
} from "@tally/engine";
import { createStandardRegistry } from "@tally/functions";
import {
  parseSessionOptions,
  type SessionManagerOptions,
  type SessionManagerOptionsInput,
} from "./options";
import {
  decodeContext,
  encodeContext,
  parseManagerSnapshot,
  type HistoryEntry,
  type ManagerSnapshot,
} from "./schema/snapshot";
import type { SessionStore } from "./storage/session-store";

interface Session {
  readonly id: string;
  name: string;
  readonly history: HistoryEntry[];
  readonly context: Context;
  buffer: string;
  lastResult: string | null;
  readonly mode: string;
}

/** One row of the session picker. */
export interface SessionOverview {
  readonly id: string;
  readonly name: string;
  readonly isActive: boolean;
}

const EMPTY_BUFFER = "0";
const NOT_AN_INTEGER = "Not an integer";

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly options: SessionManagerOptions;
  private currentId: string;
  private showFractions: boolean;

  /**
   * Starts with a single empty "Session 1".
   *
   * @throws {SnapshotError} if `options` is invalid.
   */
  constructor(
    options: SessionManagerOptionsInput = {},
    private readonly registry: FunctionRegistry = createStandardRegistry()
  ) {
    this.options = parseSessionOptions(options);
    this.showFractions = this.options.showFractions;
    this.currentId = this.addSession("Session 1").id;
  }

  // ─── Persistence ─────────────────────────────────────────────────

  /**
   * Rebuilds a manager from a snapshot. The snapshot's fraction setting
   * wins over `options.showFractions`.
   *
   * @throws {SnapshotError} if `raw` is not a valid manager snapshot.
   */
  static fromSnapshot(
    raw: unknown,
    options: SessionManagerOptionsInput = {},
    registry?: FunctionRegistry
  ): SessionManager {
    const snapshot = parseManagerSnapshot(raw);
    const manager = new SessionManager(options, registry);
    manager.sessions.clear();
    for (const session of snapshot.sessions) {
      manager.sessions.set(session.id, {
        id: session.id,
        name: session.name,
        history: [...session.history],
        context: decodeContext(session.context),
        buffer: session.buffer,
        lastResult: session.lastResult,
        mode: session.mode,
      });
    }
    manager.currentId = snapshot.currentSessionId;
    manager.showFractions = snapshot.showFractions;
    return manager;
  }

  /** Loads the stored state, or starts fresh when nothing is stored. */
  static async restore(
    store: SessionStore,
    options: SessionManagerOptionsInput = {},
    registry?: FunctionRegistry
  ): Promise<SessionManager> {
    const snapshot = await store.loadManager();
    if (!snapshot) return new SessionManager(options, registry);
    return SessionManager.fromSnapshot(snapshot, options, registry);
  }

  async save(store: SessionStore): Promise<void> {
    await store.saveManager(this.snapshot());
  }

  snapshot(): ManagerSnapshot {
    return {
      sessions: Array.from(this.sessions.values(), (session) => ({
        id: session.id,
        name: session.name,
        history: [...session.history],
        context: encodeContext(session.context),
        buffer: session.buffer,
        lastResult: session.lastResult,
        mode: session.mode,
      })),
      currentSessionId: this.currentId,
      showFractions: this.showFractions,
    };
  }

  // ─── Sessions ────────────────────────────────────────────────────

  get currentSessionId(): string {
    return this.currentId;
  }

  /** All sessions sorted by name. */
  overview(): readonly SessionOverview[] {
    return Array.from(this.sessions.values(), (session) => ({
      id: session.id,
      name: session.name,
      isActive: session.id === this.currentId,
    })).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /** Creates a session, makes it current and returns its id. */
  createSession(): string {
    const session = this.addSession(`Session ${this.sessions.size + 1}`);
    this.currentId = session.id;
    return session.id;
  }

  switchSession(id: string): boolean {
    if (!this.sessions.has(id)) return false;
    this.currentId = id;
    return true;
  }

  /**
   * Deletes a session. The last remaining session cannot be deleted.
   * Deleting the current session makes the oldest remaining one current.
   */
  deleteSession(id: string): boolean {
    if (this.sessions.size <= 1) return false;
    if (!this.sessions.delete(id)) return false;

    if (this.currentId === id) {
      const next = this.sessions.keys().next();
      if (!next.done) this.currentId = next.value;
    }
    return true;
  }

  renameSession(id: string, name: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.name = name;
    return true;
  }

  // ─── Input Buffer ────────────────────────────────────────────────

  get buffer(): string {
    return this.current().buffer;
  }

  get lastResult(): string | null {
    return this.current().lastResult;
  }

  get history(): readonly HistoryEntry[] {
    return [...this.current().history];
  }

  get fractionDisplay(): boolean {
    return this.showFractions;
  }

  /** Appends to the buffer. A lone "0" is replaced unless `text` is ".". */
  input(text: string): string {
    return this.updateBuffer((buffer) =>
      buffer === EMPTY_BUFFER && text !== "." ? text : buffer + text
    );
  }

  clear(): string {
    return this.updateBuffer(() => EMPTY_BUFFER);
  }

  backspace(): string {
    return this.updateBuffer((buffer) =>
      buffer.length > 1 ? buffer.slice(0, -1) : EMPTY_BUFFER
    );
  }

  setFractionDisplay(enabled: boolean): void {
    this.showFractions = enabled;
  }

  // ─── Evaluation ──────────────────────────────────────────────────

  /**
   * Evaluates the buffer in the current session's context and records
   * the outcome in history. The formatted result (or `Error: …`)
   * becomes both the new buffer and the last result.
   */
  evaluate(): string {
    const session = this.current();
    const expression = session.buffer;
    const outcome = tryEvaluate(expression, session.context, {
      registry: this.registry,
    });

    let result: string;
    if (outcome.ok) {
      result = this.showFractions
        ? formatNumber(outcome.value)
        : formatNumberDecimal(outcome.value);
    } else {
      result = `Error: ${outcome.error.message}`;
    }

    session.history.push({
      expression,
      result,
      timestamp: Date.now(),
      isError: !outcome.ok,
    });
    session.buffer = result;
    session.lastResult = result;
    return result;
  }

  convertToHex(): string {
    return this.convertBase(16);
  }

  convertToBin(): string {
    return this.convertBase(2);
  }

  convertToOct(): string {
    return this.convertBase(8);
  }

  // ─── Internal ────────────────────────────────────────────────────

  /**
   * Evaluates the buffer and, for an integer result, replaces the buffer
   * with its prefixed digits. History is left untouched.
   */
  private convertBase(radix: Radix): string {
    const session = this.current();
    const outcome = tryEvaluate(session.buffer, session.context, {
      registry: this.registry,
    });
    if (!outcome.ok) return NOT_AN_INTEGER;

    const { value } = outcome;
    if (value.kind !== "integer") return NOT_AN_INTEGER;
    session.buffer = formatInteger(value, radix);
    return session.buffer;
  }

  private updateBuffer(edit: (buffer: string) => string): string {
    const session = this.current();
    session.buffer = edit(session.buffer);
    return session.buffer;
  }

  private addSession(name: string): Session {
    const session: Session = {
      id: randomUUID(),
      name,
      history: [],
      context: new Context(),
      buffer: EMPTY_BUFFER,
      lastResult: null,
      mode: this.options.defaultMode,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  private current(): Session {
    const session = this.sessions.get(this.currentId);
    if (!session) {
      throw new Error(`Current session "${this.currentId}" does not exist`);
    }
    return session;
  }
}

/// <reference types="@fastify/session" />
import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Session } from "fastify";
import pino from "pino";

type SessionLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

type SessionRow = {
  data: string;
  expires_at: number;
};

const createDefaultLogger = (): SessionLogger =>
  pino({
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  });

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;
export const SESSION_PRUNE_INTERVAL_MS = 10 * 60 * 1000;

/**
 * Persistence for @fastify/session on SQLite.
 *
 * Sessions are stored as JSON with an absolute expiry; an expired row reads back
 * as "no session" and is deleted on the way.
 */
export class SqliteSessionStore {
  private db: Database.Database;
  private log: SessionLogger;
  private ttlMs: number;
  private now: () => number;
  private pruneTimer: NodeJS.Timeout | null = null;

  constructor(
    dbPath: string = "./data/sessions.db",
    opts: { ttlMs?: number; log?: SessionLogger; now?: () => number } = {}
  ) {
    this.log = opts.log ?? createDefaultLogger();
    this.ttlMs = opts.ttlMs ?? SESSION_TTL_MS;
    this.now = opts.now ?? Date.now;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_expires_at ON sessions(expires_at);
    `);
  }

  set(sessionId: string, session: object, callback: (err?: unknown) => void): void {
    try {
      const expiresAt = this.now() + this.ttlMs;
      this.db
        .prepare(
          `INSERT INTO sessions (id, data, expires_at) VALUES (?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET data = excluded.data, expires_at = excluded.expires_at`
        )
        .run(sessionId, JSON.stringify(session), expiresAt);
    } catch (error) {
      this.log.error({ evt: "session.set_failed", error: String(error) }, "session.set_failed");
      callback(error);
      return;
    }
    callback();
  }

  get(sessionId: string, callback: (err: unknown, session?: Session | null) => void): void {
    let row: SessionRow | undefined;
    try {
      row = this.db
        .prepare<[string], SessionRow>("SELECT data, expires_at FROM sessions WHERE id = ?")
        .get(sessionId);

      if (row && row.expires_at <= this.now()) {
        this.db.prepare("DELETE FROM sessions WHERE id = ?").run(sessionId);
        this.log.debug({ evt: "session.expired" }, "session.expired");
        row = undefined;
      }
    } catch (error) {
      this.log.error({ evt: "session.get_failed", error: String(error) }, "session.get_failed");
      callback(error);
      return;
    }

    if (!row) {
      callback(null, null);
      return;
    }

    let parsed: Session;
    try {
      parsed = JSON.parse(row.data);
    } catch (error) {
      this.log.warn({ evt: "session.corrupt_row" }, "session.corrupt_row");
      callback(error);
      return;
    }
    callback(null, parsed);
  }

  destroy(sessionId: string, callback: (err?: unknown) => void): void {
    try {
      this.db.prepare("DELETE FROM sessions WHERE id = ?").run(sessionId);
    } catch (error) {
      this.log.error({ evt: "session.destroy_failed", error: String(error) }, "session.destroy_failed");
      callback(error);
      return;
    }
    callback();
  }

  /** Delete every expired session. Returns the number of rows removed. */
  prune(): number {
    return this.db.prepare("DELETE FROM sessions WHERE expires_at <= ?").run(this.now()).changes;
  }

  /**
   * Prune every `intervalMs` until `stopPruning()` or `close()`. Expired rows that
   * are never read again would otherwise stay in the table.
   */
  startPruning(intervalMs: number = SESSION_PRUNE_INTERVAL_MS): void {
    this.stopPruning();
    this.pruneTimer = setInterval(() => {
      try {
        const removed = this.prune();
        this.log.debug({ evt: "session.pruned", removed }, "session.pruned");
      } catch (error) {
        this.log.error({ evt: "session.prune_failed", error: String(error) }, "session.prune_failed");
      }
    }, intervalMs);
    this.pruneTimer.unref();
  }

  stopPruning(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
  }

  get isPruning(): boolean {
    return this.pruneTimer !== null;
  }

  close(): void {
    this.stopPruning();
    this.db.close();
  }
}

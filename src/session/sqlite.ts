import Database, { type Database as DatabaseType, type Statement } from "better-sqlite3";
import { z } from "zod";
import { type SessionSnapshot, SessionSnapshotSchema } from "../schemas/session-snapshot.js";
import { SessionError } from "./errors.js";
import type { SessionStore, StoredSession } from "./store.js";

interface SqliteSessionStoreOptions {
  dbPath: string; // ":memory:" for tests, file path for production
}

const SessionRowSchema = z.object({
  session_id: z.string(),
  version: z.number().int(),
  snapshot_json: z.string(),
  updated_at: z.number(),
});

/**
 * SQLite implementation of SessionStore. One row per session holding the
 * whole snapshot as JSON, guarded by a version column.
 */
export class SqliteSessionStore implements SessionStore {
  private db: DatabaseType;
  private stmts: {
    fetch: Statement;
    insert: Statement;
    update: Statement;
    list: Statement;
    remove: Statement;
  };

  constructor(opts: SqliteSessionStoreOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id     TEXT PRIMARY KEY,
        version        INTEGER NOT NULL,
        snapshot_json  TEXT NOT NULL,
        updated_at     INTEGER NOT NULL
      );
    `);
    this.stmts = {
      fetch: this.db.prepare("SELECT * FROM sessions WHERE session_id = ?"),
      insert: this.db.prepare(`
        INSERT OR IGNORE INTO sessions (session_id, version, snapshot_json, updated_at)
        VALUES (@session_id, 1, @snapshot_json, @updated_at)
      `),
      update: this.db.prepare(`
        UPDATE sessions
        SET version = version + 1, snapshot_json = @snapshot_json, updated_at = @updated_at
        WHERE session_id = @session_id AND version = @expected_version
      `),
      list: this.db.prepare(
        "SELECT session_id, updated_at FROM sessions ORDER BY updated_at DESC, session_id ASC",
      ),
      remove: this.db.prepare("DELETE FROM sessions WHERE session_id = ?"),
    };
  }

  close(): void {
    this.db.close();
  }

  async load(session_id: string): Promise<StoredSession | null> {
    const row = this.stmts.fetch.get(session_id);
    if (row === undefined) return null;

    const parsedRow = SessionRowSchema.parse(row);
    let json: unknown;
    try {
      json = JSON.parse(parsedRow.snapshot_json);
    } catch (err) {
      console.warn(`[session] snapshot for ${session_id} is not valid JSON:`, err);
      throw new SessionError("CORRUPT_SNAPSHOT", `Snapshot for ${session_id} is not valid JSON`, session_id);
    }
    const parsed = SessionSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[session] corrupted snapshot for ${session_id}: ${parsed.error.message}`);
      throw new SessionError("CORRUPT_SNAPSHOT", `Corrupted snapshot for ${session_id}`, session_id);
    }
    return { snapshot: parsed.data, version: parsedRow.version };
  }

  async save(snapshot: SessionSnapshot, expected_version: number): Promise<number> {
    const row = {
      session_id: snapshot.session_id,
      snapshot_json: JSON.stringify(snapshot),
      updated_at: snapshot.updated_at,
    };
    const result =
      expected_version === 0
        ? this.stmts.insert.run(row)
        : this.stmts.update.run({ ...row, expected_version });

    if (result.changes === 0) {
      throw new SessionError(
        "VERSION_MISMATCH",
        `Session ${snapshot.session_id} is not at version ${expected_version}`,
        snapshot.session_id,
      );
    }
    return expected_version + 1;
  }

  async list(): Promise<Array<{ session_id: string; updated_at: number }>> {
    return this.stmts.list
      .all()
      .map((row) => SessionRowSchema.pick({ session_id: true, updated_at: true }).parse(row));
  }

  async delete(session_id: string): Promise<boolean> {
    return this.stmts.remove.run(session_id).changes > 0;
  }
}

import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import { monotonicFactory } from "ulid";
import { z } from "zod";
import { ArtifactSourceTypeSchema } from "../schemas/domain.js";
import { ArtifactError } from "./errors.js";
import { contentHash } from "./hash.js";
import { normalize } from "./normalize.js";
import type { ArtifactStore } from "./store.js";
import type {
  AddOpts,
  AddResult,
  Artifact,
  ArtifactView,
  ListOpts,
  ListResult,
} from "./types.js";

const MAX_TEXT_CHARS = 2_000_000;
const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;
const ARCHIVE_KEY = "";

// Monotonic so ids minted in the same millisecond still sort in insert order.
const ulid = monotonicFactory();

interface SqliteArtifactStoreOptions {
  dbPath: string; // ":memory:" for tests, file path for production
}

const ArtifactRowSchema = z.object({
  id: z.string(),
  session_id: z.string().nullable(),
  filename: z.string(),
  filename_norm: z.string(),
  source_type: ArtifactSourceTypeSchema,
  content_hash: z.string(),
  raw_text: z.string(),
  size_bytes: z.number(),
  summary: z.string().nullable(),
  summary_status: z.enum(["pending", "ready", "failed"]),
  metadata_json: z.string(),
  ingested_at: z.number(),
  updated_at: z.number(),
});

const MetadataSchema = z.record(z.unknown());

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes("UNIQUE constraint failed");
}

function sessionKey(session_id: string | null): string {
  return session_id ?? ARCHIVE_KEY;
}

/**
 * SQLite implementation of ArtifactStore.
 * WAL mode; the (session, filename, hash) dedup rule is a unique index so
 * concurrent ingestion of the same file cannot create two rows.
 */
export class SqliteArtifactStore implements ArtifactStore {
  private db: DatabaseType;
  private stmts: {
    fetchById: Statement;
    fetchByIdentity: Statement;
    fetchByFilename: Statement;
    insertArtifact: Statement;
    moveArtifact: Statement;
    updateSummary: Statement;
    updateMetadata: Statement;
    sessionIds: Statement;
    deleteById: Statement;
  };

  constructor(opts: SqliteArtifactStoreOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS artifacts (
        id              TEXT PRIMARY KEY,

        -- Ownership (session_key is session_id, or '' for the archive)
        session_id      TEXT,
        session_key     TEXT NOT NULL,

        -- Identity (raw + normalized)
        filename        TEXT NOT NULL,
        filename_norm   TEXT NOT NULL,
        content_hash    TEXT NOT NULL,

        -- Content
        source_type     TEXT NOT NULL,
        raw_text        TEXT NOT NULL,
        size_bytes      INTEGER NOT NULL,
        summary         TEXT,
        summary_status  TEXT NOT NULL DEFAULT 'pending',
        metadata_json   TEXT NOT NULL DEFAULT '{}',

        -- Lifecycle
        ingested_at     INTEGER NOT NULL,
        updated_at      INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS ux_artifacts_identity
        ON artifacts(session_key, filename_norm, content_hash);
      CREATE INDEX IF NOT EXISTS idx_artifacts_session ON artifacts(session_key, ingested_at);
      CREATE INDEX IF NOT EXISTS idx_artifacts_hash ON artifacts(content_hash);
    `);
  }

  private prepareStatements() {
    return {
      fetchById: this.db.prepare(`
        SELECT * FROM artifacts WHERE id = ?
      `),
      fetchByIdentity: this.db.prepare(`
        SELECT * FROM artifacts
        WHERE session_key = ? AND filename_norm = ? AND content_hash = ?
      `),
      fetchByFilename: this.db.prepare(`
        SELECT * FROM artifacts
        WHERE session_key = ? AND filename_norm = ?
        ORDER BY ingested_at DESC, id DESC
        LIMIT 1
      `),
      insertArtifact: this.db.prepare(`
        INSERT INTO artifacts (
          id, session_id, session_key, filename, filename_norm, content_hash,
          source_type, raw_text, size_bytes, summary, summary_status,
          metadata_json, ingested_at, updated_at
        ) VALUES (
          @id, @session_id, @session_key, @filename, @filename_norm, @content_hash,
          @source_type, @raw_text, @size_bytes, NULL, 'pending',
          @metadata_json, @ingested_at, @updated_at
        )
      `),
      moveArtifact: this.db.prepare(`
        UPDATE artifacts
        SET session_id = @session_id, session_key = @session_key, updated_at = @updated_at
        WHERE id = @id
      `),
      updateSummary: this.db.prepare(`
        UPDATE artifacts
        SET summary = @summary, summary_status = @summary_status, updated_at = @updated_at
        WHERE id = @id
      `),
      updateMetadata: this.db.prepare(`
        UPDATE artifacts SET metadata_json = @metadata_json, updated_at = @updated_at
        WHERE id = @id
      `),
      sessionIds: this.db.prepare(`
        SELECT id FROM artifacts WHERE session_key = ? ORDER BY ingested_at ASC, id ASC
      `),
      deleteById: this.db.prepare(`
        DELETE FROM artifacts WHERE id = ?
      `),
    };
  }

  private rowToArtifact(row: unknown): Artifact {
    const parsed = ArtifactRowSchema.parse(row);
    return {
      id: parsed.id,
      session_id: parsed.session_id,
      filename: parsed.filename,
      filename_norm: parsed.filename_norm,
      source_type: parsed.source_type,
      content_hash: parsed.content_hash,
      raw_text: parsed.raw_text,
      size_bytes: parsed.size_bytes,
      summary: parsed.summary,
      summary_status: parsed.summary_status,
      metadata: MetadataSchema.parse(JSON.parse(parsed.metadata_json)),
      ingested_at: parsed.ingested_at,
      updated_at: parsed.updated_at,
    };
  }

  private fetchRow(id: string): Artifact | null {
    const row = this.stmts.fetchById.get(id);
    return row === undefined ? null : this.rowToArtifact(row);
  }

  private requireRow(id: string): Artifact {
    const artifact = this.fetchRow(id);
    if (!artifact) {
      throw new ArtifactError("NOT_FOUND", `Artifact not found: ${id}`);
    }
    return artifact;
  }

  async add(opts: AddOpts): Promise<AddResult> {
    if (opts.filename.trim() === "") {
      throw new ArtifactError("INVALID_REQUEST", "filename must not be empty");
    }
    if (opts.content.length > MAX_TEXT_CHARS) {
      throw new ArtifactError(
        "CONTENT_TOO_LARGE",
        `content exceeds ${MAX_TEXT_CHARS} chars`,
      );
    }

    const hash = opts.content_hash ?? contentHash(opts.content);
    const key = sessionKey(opts.session_id);
    const filenameNorm = normalize(opts.filename);
    const now = Date.now();
    const id = ulid();

    // Dedup check and insert in one transaction
    const tx = this.db.transaction((): AddResult => {
      const existing = this.stmts.fetchByIdentity.get(key, filenameNorm, hash);
      if (existing !== undefined) {
        return { artifact: this.rowToArtifact(existing), created: false };
      }
      this.stmts.insertArtifact.run({
        id,
        session_id: opts.session_id,
        session_key: key,
        filename: opts.filename,
        filename_norm: filenameNorm,
        content_hash: hash,
        source_type: opts.source_type,
        raw_text: opts.content,
        size_bytes: opts.size_bytes ?? Buffer.byteLength(opts.content, "utf8"),
        metadata_json: JSON.stringify(opts.metadata ?? {}),
        ingested_at: now,
        updated_at: now,
      });
      return { artifact: this.requireRow(id), created: true };
    });

    return tx();
  }

  async get(id: string): Promise<Artifact | null> {
    return this.fetchRow(id);
  }

  async existingArtifact(
    session_id: string | null,
    filename: string,
    content_hash?: string,
  ): Promise<Artifact | null> {
    const key = sessionKey(session_id);
    const filenameNorm = normalize(filename);
    const row =
      content_hash === undefined
        ? this.stmts.fetchByFilename.get(key, filenameNorm)
        : this.stmts.fetchByIdentity.get(key, filenameNorm, content_hash);
    return row === undefined ? null : this.rowToArtifact(row);
  }

  async list(opts: ListOpts): Promise<ListResult> {
    const limit = Math.min(opts.limit ?? DEFAULT_LIMIT, MAX_LIMIT);
    const offset = opts.offset ?? 0;
    const orderColumn = opts.order_by === "updated_at" ? "updated_at" : "ingested_at";

    // Build WHERE clause dynamically
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (opts.session_id !== undefined) {
      conditions.push("session_key = ?");
      params.push(sessionKey(opts.session_id));
    } else if (opts.archived) {
      conditions.push("session_id IS NULL");
    }

    if (opts.source_type !== undefined) {
      conditions.push("source_type = ?");
      params.push(opts.source_type);
    }

    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    // Fetch limit + 1 to detect has_more
    const sql = `
      SELECT * FROM artifacts
      ${whereClause}
      ORDER BY ${orderColumn} ASC, id ASC
      LIMIT ? OFFSET ?
    `;
    params.push(limit + 1, offset);

    const rows = this.db.prepare(sql).all(...params);
    const hasMore = rows.length > limit;
    const items = rows
      .slice(0, limit)
      .map((row) => toView(this.rowToArtifact(row)));

    return {
      items,
      pagination: {
        limit,
        offset,
        has_more: hasMore,
      },
    };
  }

  async promote(id: string, session_id: string): Promise<Artifact> {
    const tx = this.db.transaction((): Artifact => {
      const artifact = this.requireRow(id);
      if (artifact.session_id !== null) {
        throw new ArtifactError(
          "ALREADY_ATTACHED",
          `Artifact ${id} is already attached to session ${artifact.session_id}`,
        );
      }
      this.move(id, session_id);
      return this.requireRow(id);
    });
    return tx();
  }

  async demote(id: string): Promise<Artifact> {
    const tx = this.db.transaction((): Artifact => {
      const artifact = this.requireRow(id);
      if (artifact.session_id === null) {
        throw new ArtifactError("NOT_ATTACHED", `Artifact ${id} is already archived`);
      }
      this.move(id, null);
      return this.requireRow(id);
    });
    return tx();
  }

  private move(id: string, session_id: string | null): void {
    try {
      this.stmts.moveArtifact.run({
        id,
        session_id,
        session_key: sessionKey(session_id),
        updated_at: Date.now(),
      });
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ArtifactError(
          "DUPLICATE_ARTIFACT",
          `An identical artifact already exists in ${session_id ?? "the archive"}`,
        );
      }
      throw err;
    }
  }

  async setSummary(id: string, summary: string | null): Promise<Artifact> {
    const result = this.stmts.updateSummary.run({
      id,
      summary,
      summary_status: summary === null ? "failed" : "ready",
      updated_at: Date.now(),
    });
    if (result.changes === 0) {
      throw new ArtifactError("NOT_FOUND", `Artifact not found: ${id}`);
    }
    return this.requireRow(id);
  }

  async updateMetadata(
    id: string,
    metadata: Record<string, unknown>,
  ): Promise<Artifact> {
    const result = this.stmts.updateMetadata.run({
      id,
      metadata_json: JSON.stringify(metadata),
      updated_at: Date.now(),
    });
    if (result.changes === 0) {
      throw new ArtifactError("NOT_FOUND", `Artifact not found: ${id}`);
    }
    return this.requireRow(id);
  }

  async listSessionIds(session_id: string): Promise<string[]> {
    return this.stmts.sessionIds
      .all(sessionKey(session_id))
      .map((row) => z.object({ id: z.string() }).parse(row).id);
  }

  async delete(id: string): Promise<boolean> {
    return this.stmts.deleteById.run(id).changes > 0;
  }
}

/** Strip raw text for listings. */
export function toView(artifact: Artifact): ArtifactView {
  const { raw_text: _, ...rest } = artifact;
  return { ...rest, needs_full_fetch: artifact.summary === null };
}

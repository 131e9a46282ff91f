import type {
  AddOpts,
  AddResult,
  Artifact,
  ListOpts,
  ListResult,
} from "./types.js";

/**
 * Interface for artifact storage operations.
 * Every mutation is a single atomic call; no caller holds a lock across an await.
 * Implementations: SqliteArtifactStore
 */
export interface ArtifactStore {
  /**
   * Add an artifact, or return the existing one when the same session
   * already holds an artifact with the same filename and content hash.
   */
  add(opts: AddOpts): Promise<AddResult>;

  /** Fetch a single artifact by id. Returns null if not found. */
  get(id: string): Promise<Artifact | null>;

  /**
   * Dedup lookup: the artifact in `session_id` (null = archive) with this
   * filename and, when given, this content hash.
   */
  existingArtifact(
    session_id: string | null,
    filename: string,
    content_hash?: string,
  ): Promise<Artifact | null>;

  /** List artifacts without raw text. */
  list(opts: ListOpts): Promise<ListResult>;

  /** Attach an archived artifact to a session. Metadata only. */
  promote(id: string, session_id: string): Promise<Artifact>;

  /** Detach an artifact from its session into the archive. Metadata only. */
  demote(id: string): Promise<Artifact>;

  /** Record a summary; null marks summarization as failed. */
  setSummary(id: string, summary: string | null): Promise<Artifact>;

  /** Replace the classification metadata. */
  updateMetadata(id: string, metadata: Record<string, unknown>): Promise<Artifact>;

  /** Ids of every artifact attached to the session, oldest first. */
  listSessionIds(session_id: string): Promise<string[]>;

  /** Permanently delete an artifact. Returns false if it did not exist. */
  delete(id: string): Promise<boolean>;
}

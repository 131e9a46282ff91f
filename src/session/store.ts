import type { SessionSnapshot } from "../schemas/session-snapshot.js";

export interface StoredSession {
  snapshot: SessionSnapshot;
  version: number;
}

/**
 * Durable per-session state with optimistic locking.
 * Implementations: SqliteSessionStore
 */
export interface SessionStore {
  load(session_id: string): Promise<StoredSession | null>;

  /**
   * Write a snapshot. `expected_version` 0 creates the session; any other
   * value must match the stored version. Returns the new version.
   */
  save(snapshot: SessionSnapshot, expected_version: number): Promise<number>;

  /** Session ids, most recently updated first. */
  list(): Promise<Array<{ session_id: string; updated_at: number }>>;

  delete(session_id: string): Promise<boolean>;
}

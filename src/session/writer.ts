import type { SessionSnapshot } from "../schemas/session-snapshot.js";
import { SessionError } from "./errors.js";
import type { SessionStore } from "./store.js";

export interface SessionWriterOpts {
  store: SessionStore;
  session_id: string;
}

/**
 * Serializes session checkpoints. Writes go through a promise chain so two
 * checkpoints never race, with optimistic locking and a single retry on
 * VERSION_MISMATCH.
 */
export class SessionWriter {
  private version: number | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  private readonly store: SessionStore;
  readonly session_id: string;

  constructor(opts: SessionWriterOpts) {
    this.store = opts.store;
    this.session_id = opts.session_id;
  }

  /** Load the stored snapshot, if any, and adopt its version. */
  async init(): Promise<SessionSnapshot | null> {
    const stored = await this.store.load(this.session_id);
    this.version = stored?.version ?? 0;
    return stored?.snapshot ?? null;
  }

  get currentVersion(): number | null {
    return this.version;
  }

  /** Persist a snapshot once every earlier checkpoint has been written. */
  async checkpoint(snapshot: SessionSnapshot): Promise<void> {
    const write = this.writeQueue.then(() => this.persistWithRetry(snapshot));
    // The caller sees a failed write; later checkpoints still run.
    this.writeQueue = write.catch(() => undefined);
    await write;
  }

  /** Wait for queued checkpoints. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private async persistWithRetry(snapshot: SessionSnapshot): Promise<void> {
    if (this.version === null) {
      throw new SessionError("NOT_INITIALIZED", "SessionWriter not initialized", this.session_id);
    }

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        this.version = await this.store.save(snapshot, this.version);
        return;
      } catch (e) {
        if (e instanceof SessionError && e.code === "VERSION_MISMATCH" && attempt === 0) {
          // Another writer moved the row; the snapshot is whole-state, so reload and write over it.
          const stored = await this.store.load(this.session_id);
          console.warn(`[session] ${this.session_id} version moved, retrying once`);
          this.version = stored?.version ?? 0;
          continue;
        }
        if (e instanceof SessionError && e.code === "VERSION_MISMATCH") {
          throw new SessionError(
            "VERSION_MISMATCH",
            `VERSION_MISMATCH after retry for ${this.session_id}`,
            this.session_id,
          );
        }
        throw e;
      }
    }
  }
}

export { SessionError, type SessionErrorCode } from "./errors.js";
export { SqliteSessionStore } from "./sqlite.js";
export type { SessionStore, StoredSession } from "./store.js";
export { SessionWriter, type SessionWriterOpts } from "./writer.js";

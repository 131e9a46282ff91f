export type SessionErrorCode =
  | "VERSION_MISMATCH" // optimistic lock lost
  | "CORRUPT_SNAPSHOT" // stored row failed validation
  | "NOT_INITIALIZED";

export class SessionError extends Error {
  constructor(
    public readonly code: SessionErrorCode,
    message: string,
    public readonly session_id?: string,
  ) {
    super(message);
    this.name = "SessionError";
  }
}

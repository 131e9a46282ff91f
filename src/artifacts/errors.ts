/**
 * Error codes for artifact store operations.
 */
export type ErrorCode =
  | "NOT_FOUND"           // artifact doesn't exist
  | "DUPLICATE_ARTIFACT"  // move would collide with an identical artifact
  | "ALREADY_ATTACHED"    // promote on an artifact that belongs to a session
  | "NOT_ATTACHED"        // demote on an archived artifact
  | "CONTENT_TOO_LARGE"   // extracted text exceeds the store limit
  | "INVALID_REQUEST";    // invalid parameter combination

/**
 * Custom error class for artifact store operations.
 * Enables typed error handling via error.code.
 */
export class ArtifactError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ArtifactError";
  }
}

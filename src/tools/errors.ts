import { ArtifactError } from "../artifacts/errors.js";
import { isFatal } from "../engine/errors.js";
import { LedgerError } from "../objectives/errors.js";
import type { ToolErrorPayload } from "../schemas/tool-result.js";

export type ToolErrorCode =
  | "TOOL_NOT_ALLOWED" // gate refused the call for the current phase/waiting state
  | "UNKNOWN_TOOL" // no tool registered under that name
  | "INVALID_ARGUMENTS" // arguments failed JSON parsing or validation
  | "CONFLICT" // request is valid but contradicts current state
  | "EXECUTION_FAILED"; // tool ran and failed

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly tool?: string,
  ) {
    super(message);
    this.name = "ToolError";
  }
}

/**
 * Convert an error raised while executing a tool into the structured
 * `{ kind, message }` the LLM receives. Fatal errors are rethrown.
 */
export function toToolErrorPayload(err: unknown): ToolErrorPayload {
  if (isFatal(err)) throw err;

  if (err instanceof ToolError) {
    switch (err.code) {
      case "TOOL_NOT_ALLOWED":
        return { kind: "tool_not_allowed", message: err.message };
      case "UNKNOWN_TOOL":
        return { kind: "unknown_tool", message: err.message };
      case "INVALID_ARGUMENTS":
        return { kind: "invalid_arguments", message: err.message };
      case "CONFLICT":
        return { kind: "conflict", message: err.message };
      case "EXECUTION_FAILED":
        return { kind: "execution_failed", message: err.message };
    }
  }
  if (err instanceof ArtifactError) {
    switch (err.code) {
      case "NOT_FOUND":
        return { kind: "not_found", message: err.message };
      case "INVALID_REQUEST":
      case "CONTENT_TOO_LARGE":
        return { kind: "invalid_arguments", message: err.message };
      case "DUPLICATE_ARTIFACT":
      case "ALREADY_ATTACHED":
      case "NOT_ATTACHED":
        return { kind: "conflict", message: err.message };
    }
  }
  if (err instanceof LedgerError) {
    switch (err.code) {
      case "UNKNOWN_OBJECTIVE":
        return { kind: "unknown_objective", message: err.message };
      case "DUPLICATE_OBJECTIVE":
        return { kind: "duplicate_objective", message: err.message };
      case "INVALID_OBJECTIVE_ID":
        return { kind: "invalid_arguments", message: err.message };
      case "WRITE_OUTSIDE_DISCIPLINE":
        throw err;
    }
  }
  if (err instanceof Error && err.name === "AbortError") {
    return { kind: "cancelled", message: err.message };
  }
  return {
    kind: "execution_failed",
    message: err instanceof Error ? err.message : String(err),
  };
}

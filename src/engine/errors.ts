export type EngineErrorCode =
  | "INVARIANT_VIOLATION" // internal invariant violated (e.g., reply for an unknown tool call)
  | "INBOX_CLOSED" // message submitted after the orchestrator stopped
  | "NOT_STARTED" // step() called before start()/restore()
  | "ALREADY_RUNNING" // second concurrent step() on the single conversation thread
  | "INTERRUPTED"; // abort reason of a step cut off by interrupt()

export class EngineError extends Error {
  readonly fatal: boolean;

  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details?: {
      session_id?: string;
      call_id?: string;
      tool?: string;
    },
  ) {
    super(message);
    this.name = "EngineError";
    this.fatal = code === "INVARIANT_VIOLATION";
  }
}

/**
 * Fatal errors are programming-level invariant violations. They are never
 * converted into tool errors or swallowed by event delivery.
 */
export function isFatal(err: unknown): boolean {
  return (
    err instanceof Error &&
    "fatal" in err &&
    err.fatal === true
  );
}

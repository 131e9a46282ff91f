import type { TaskErrorCode } from "./types.js";

export class AgentError extends Error {
  constructor(
    public readonly code: TaskErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AgentError";
  }
}

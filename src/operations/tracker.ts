import { OperationError } from "./errors.js";
import type {
  OperationState,
  RegisterOpts,
  ToolOperation,
} from "./types.js";

/**
 * Lifecycle of every tool invocation the primary conversation issues.
 *
 * Terminal operations keep their output until cleaned up so an interrupted
 * conversation can answer dangling tool calls from here instead of
 * re-invoking side-effecting tools. Late or duplicate completions are an
 * expected race: they log a warning and change nothing.
 */
export class OperationTracker {
  private operations = new Map<string, ToolOperation>();

  register(opts: RegisterOpts): Readonly<ToolOperation> {
    if (this.operations.has(opts.call_id)) {
      throw new OperationError(
        "DUPLICATE_OPERATION",
        `Operation already registered: ${opts.call_id}`,
        opts.call_id,
      );
    }
    const operation: ToolOperation = {
      call_id: opts.call_id,
      tool: opts.tool,
      arguments: opts.arguments,
      state: "registered",
      output: null,
      registered_at: Date.now(),
      finished_at: null,
    };
    this.operations.set(opts.call_id, operation);
    return Object.freeze({ ...operation });
  }

  complete(call_id: string, output: string): boolean {
    return this.finish(call_id, "completed", output);
  }

  cancel(call_id: string, reason: string): boolean {
    return this.finish(call_id, "cancelled", cancelledOutput(reason));
  }

  /** `output` defaults to an execution_failed payload built from `error`. */
  fail(call_id: string, error: unknown, output?: string): boolean {
    return this.finish(call_id, "failed", output ?? failedOutput(error));
  }

  /** Terminal output, or undefined while registered or unknown. */
  result(call_id: string): string | undefined {
    return this.operations.get(call_id)?.output ?? undefined;
  }

  get(call_id: string): Readonly<ToolOperation> | undefined {
    const operation = this.operations.get(call_id);
    return operation ? Object.freeze({ ...operation }) : undefined;
  }

  isTerminal(call_id: string): boolean {
    const state = this.operations.get(call_id)?.state;
    return state !== undefined && state !== "registered";
  }

  /** Cancel every registered operation. Returns the ids it cancelled. */
  cancelAll(reason: string): string[] {
    const cancelled: string[] = [];
    for (const operation of this.operations.values()) {
      if (operation.state === "registered") {
        this.finish(operation.call_id, "cancelled", cancelledOutput(reason));
        cancelled.push(operation.call_id);
      }
    }
    if (cancelled.length > 0) {
      console.info(`[operations] cancelled ${cancelled.length} pending: ${reason}`);
    }
    return cancelled;
  }

  /** Forget an operation. Further mutations on it are unknown-id no-ops. */
  cleanup(call_id: string): boolean {
    return this.operations.delete(call_id);
  }

  pending(): Readonly<ToolOperation>[] {
    return [...this.operations.values()]
      .filter((o) => o.state === "registered")
      .map((o) => Object.freeze({ ...o }));
  }

  snapshot(): Readonly<ToolOperation>[] {
    return [...this.operations.values()].map((o) => Object.freeze({ ...o }));
  }

  restore(operations: readonly ToolOperation[]): void {
    this.operations = new Map(operations.map((o) => [o.call_id, { ...o }]));
  }

  private finish(call_id: string, state: OperationState, output: string): boolean {
    const operation = this.operations.get(call_id);
    if (!operation) {
      console.warn(`[operations] ${state} for unknown call ${call_id} ignored`);
      return false;
    }
    if (operation.state !== "registered") {
      console.warn(
        `[operations] ${state} for ${call_id} ignored: already ${operation.state}`,
      );
      return false;
    }
    operation.state = state;
    operation.output = output;
    operation.finished_at = Date.now();
    return true;
  }
}

/** Output recorded for a cancelled call, as the LLM will read it. */
export function cancelledOutput(reason: string): string {
  return JSON.stringify({ ok: false, error: { kind: "cancelled", message: reason } });
}

function failedOutput(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return JSON.stringify({ ok: false, error: { kind: "execution_failed", message } });
}

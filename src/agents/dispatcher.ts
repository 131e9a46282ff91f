import { monotonicFactory } from "ulid";
import type { ArtifactStore } from "../artifacts/store.js";
import type { Artifact } from "../artifacts/types.js";
import type { EngineConfig } from "../config/config.js";
import { isFatal } from "../engine/errors.js";
import { Semaphore } from "../engine/semaphore.js";
import type { EventBus } from "../events/bus.js";
import { LlmError } from "../llm/types.js";
import type { KnowledgeCardDraft } from "../schemas/knowledge-card.js";
import { AgentError } from "./errors.js";
import { checkEvidence } from "./evidence.js";
import type { AgentHandleRegistry } from "./handles.js";
import type {
  DispatchHandle,
  DispatchOpts,
  DispatchResult,
  DispatchStatus,
  SubAgentTask,
  TaskAssignment,
  TaskError,
} from "./types.js";

/** Runs one task's session to a card. AgentRunner is the production runner. */
export interface TaskRunner {
  readonly tool_set: readonly string[];
  run(task: SubAgentTask, signal: AbortSignal): Promise<KnowledgeCardDraft>;
}

export interface SubAgentDispatcherDeps {
  runner: TaskRunner;
  store: Pick<ArtifactStore, "get">;
  bus: EventBus;
  handles: AgentHandleRegistry;
  config: Pick<EngineConfig, "maxConcurrency" | "agentTimeoutMs">;
}

function taskError(err: unknown, signal: AbortSignal): TaskError {
  // An aborted task reports why it was aborted, not how the in-flight call died.
  const cause = signal.aborted ? signal.reason : err;
  if (cause instanceof AgentError) return { code: cause.code, message: cause.message };
  if (cause instanceof LlmError) return { code: "LLM_ERROR", message: cause.message };
  return {
    code: "AGENT_FAILED",
    message: cause instanceof Error ? cause.message : String(cause),
  };
}

function dispatchStatus(tasks: SubAgentTask[], cancelled: boolean): DispatchStatus {
  if (cancelled) return "cancelled";
  const succeeded = tasks.filter((t) => t.status === "succeeded").length;
  if (succeeded === tasks.length) return "succeeded";
  return succeeded === 0 ? "failed" : "partial_failure";
}

/**
 * Fans assignments out to isolated sub-agent sessions, at most
 * `max_concurrency` at a time. One task's failure never aborts its
 * siblings; results of tasks that finished before a cancellation are kept.
 */
export class SubAgentDispatcher {
  private readonly nextId = monotonicFactory();
  private live = new Map<string, DispatchHandle>();

  constructor(private readonly deps: SubAgentDispatcherDeps) {}

  /** Start a dispatch and return its handle immediately. */
  start(assignments: TaskAssignment[], opts: DispatchOpts = {}): DispatchHandle {
    const { bus, handles, runner, config } = this.deps;
    const dispatch_id = this.nextId();
    const controller = new AbortController();
    const max_concurrency = opts.max_concurrency ?? config.maxConcurrency;
    const semaphore = new Semaphore(max_concurrency);

    const queued_at = Date.now();
    const tasks = assignments.map((assignment): SubAgentTask => ({
      task_id: this.nextId(),
      dispatch_id,
      assignment,
      tool_set: [...runner.tool_set],
      status: "queued",
      result: null,
      error: null,
      usage: { input_tokens: 0, output_tokens: 0 },
      queued_at,
      started_at: null,
      finished_at: null,
    }));

    // Task controllers exist from the start so a queued task can be killed too.
    const controllers = new Map<string, AbortController>();
    const unregister = new Map<string, () => void>();
    const entries = tasks.map((task) => {
      const taskController = new AbortController();
      controllers.set(task.task_id, taskController);
      const kill = (reason: string) => {
        taskController.abort(new AgentError("CANCELLED", reason));
      };
      unregister.set(task.task_id, handles.register(task.task_id, dispatch_id, kill));
      return { task, taskController };
    });
    controller.signal.addEventListener(
      "abort",
      () => {
        for (const taskController of controllers.values()) {
          taskController.abort(controller.signal.reason);
        }
      },
      { once: true },
    );

    // Hooked up after the task controllers so an already-aborted caller reaches them.
    const onParentAbort = () => {
      controller.abort(new AgentError("CANCELLED", "dispatch cancelled by caller"));
    };
    if (opts.signal?.aborted) onParentAbort();
    else opts.signal?.addEventListener("abort", onParentAbort, { once: true });

    for (const task of tasks) this.progress(task);

    const finish = (task: SubAgentTask, error: TaskError | null, card?: KnowledgeCardDraft) => {
      unregister.get(task.task_id)?.();
      this.finish(task, error, card);
    };

    const runTask = async ({
      task,
      taskController,
    }: { task: SubAgentTask; taskController: AbortController }): Promise<void> => {
      const signal = taskController.signal;

      try {
        await semaphore.acquire(signal);
      } catch (err) {
        finish(task, taskError(err, signal));
        return;
      }
      if (signal.aborted) {
        // Cancelled in the same tick the permit was granted.
        semaphore.release();
        finish(task, taskError(signal.reason, signal));
        return;
      }

      const timer = setTimeout(() => {
        taskController.abort(
          new AgentError("TIMEOUT", `task exceeded ${config.agentTimeoutMs}ms`),
        );
      }, config.agentTimeoutMs);

      try {
        task.status = "running";
        task.started_at = Date.now();
        this.progress(task);

        let card: KnowledgeCardDraft;
        try {
          card = await runner.run(task, signal);
          await this.verifyEvidence(task, card);
          signal.throwIfAborted();
        } catch (err) {
          if (isFatal(err)) throw err;
          finish(task, taskError(err, signal));
          return;
        }

        try {
          await opts.on_result?.(task, card);
        } catch (err) {
          if (isFatal(err)) throw err;
          console.warn(`[dispatcher] merge of ${task.task_id} failed:`, err);
          finish(task, {
            code: "MERGE_FAILED",
            message: err instanceof Error ? err.message : String(err),
          });
          return;
        }
        finish(task, null, card);
      } finally {
        clearTimeout(timer);
        semaphore.release();
      }
    };

    const done = Promise.all(entries.map(runTask))
      .then((): DispatchResult => {
        const status = dispatchStatus(tasks, controller.signal.aborted);
        console.info(`[dispatcher] ${dispatch_id} finished: ${status}`);
        return {
          dispatch_id,
          status,
          tasks: tasks.map((t) => ({ ...t })),
          succeeded: tasks.flatMap((t) =>
            t.status === "succeeded" && t.result ? [{ task_id: t.task_id, card: t.result }] : [],
          ),
        };
      })
      .finally(() => {
        for (const fn of unregister.values()) fn();
        opts.signal?.removeEventListener("abort", onParentAbort);
        this.live.delete(dispatch_id);
      });

    const handle: DispatchHandle = {
      dispatch_id,
      tasks: () => tasks.map((t) => ({ ...t })),
      cancel: (reason = "dispatch cancelled") => {
        controller.abort(new AgentError("CANCELLED", reason));
      },
      cancelTask: (task_id, reason = "task cancelled") => {
        const task = tasks.find((t) => t.task_id === task_id);
        const taskController = controllers.get(task_id);
        if (!task || !taskController || task.finished_at !== null) return false;
        taskController.abort(new AgentError("CANCELLED", reason));
        return true;
      },
      done,
    };
    this.live.set(dispatch_id, handle);
    console.info(
      `[dispatcher] ${dispatch_id} started: ${tasks.length} task(s), concurrency ${max_concurrency}`,
    );
    return handle;
  }

  /** Start a dispatch and wait for every task to settle. */
  async dispatch(assignments: TaskAssignment[], opts: DispatchOpts = {}): Promise<DispatchResult> {
    return this.start(assignments, opts).done;
  }

  /** Cancel every dispatch still running. Returns their ids. */
  cancelAll(reason: string): string[] {
    const ids = [...this.live.keys()];
    for (const handle of this.live.values()) handle.cancel(reason);
    return ids;
  }

  get activeDispatches(): string[] {
    return [...this.live.keys()];
  }

  /** No evidence, no claim: whatever runner produced the card, it is checked before merging. */
  private async verifyEvidence(task: SubAgentTask, card: KnowledgeCardDraft): Promise<void> {
    const artifacts = new Map<string, Artifact>();
    for (const id of task.assignment.artifact_ids) {
      const artifact = await this.deps.store.get(id);
      if (artifact) artifacts.set(id, artifact);
    }
    const check = checkEvidence(card, artifacts);
    if (!check.ok) throw new AgentError("EVIDENCE_MISSING", check.message);
  }

  private finish(task: SubAgentTask, error: TaskError | null, card?: KnowledgeCardDraft): void {
    task.finished_at = Date.now();
    if (error) {
      task.status = error.code === "CANCELLED" ? "cancelled" : "failed";
      task.error = error;
    } else {
      task.status = "succeeded";
      task.result = card ?? null;
    }
    this.progress(task);
  }

  private progress(task: SubAgentTask): void {
    this.deps.bus.publish({
      type: "agent-progress",
      dispatch_id: task.dispatch_id,
      task_id: task.task_id,
      status: task.status,
      ...(task.error ? { message: task.error.message } : {}),
    });
  }
}

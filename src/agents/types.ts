import type { z } from "zod";
import type { KnowledgeCardDraft } from "../schemas/knowledge-card.js";
import type { TaskAssignmentSchema } from "../schemas/session-snapshot.js";

/** `artifact_ids` are the only evidence the sub-agent may read. */
export type TaskAssignment = z.infer<typeof TaskAssignmentSchema>;

export type TaskStatus = "queued" | "running" | "succeeded" | "failed" | "cancelled";

export type TaskErrorCode =
  | "EVIDENCE_MISSING" // a claim's quote is absent or not found verbatim in the task's artifacts
  | "INVALID_SUBMISSION" // submissions kept failing schema validation
  | "NO_SUBMISSION" // the agent stopped responding without submitting
  | "MAX_TURNS" // turn budget exhausted
  | "TIMEOUT" // wall-clock budget exhausted
  | "ARTIFACT_UNAVAILABLE" // an assigned artifact does not exist
  | "LLM_ERROR" // provider failure after retries
  | "MERGE_FAILED" // result handler rejected the card
  | "AGENT_FAILED" // unexpected failure inside the session
  | "CANCELLED";

export interface TaskError {
  code: TaskErrorCode;
  message: string;
}

export interface SubAgentTask {
  task_id: string;
  dispatch_id: string;
  assignment: TaskAssignment;
  tool_set: string[];
  status: TaskStatus;
  result: KnowledgeCardDraft | null;
  error: TaskError | null;
  usage: { input_tokens: number; output_tokens: number };
  queued_at: number; // Unix timestamp (ms)
  started_at: number | null;
  finished_at: number | null;
}

export type DispatchStatus = "succeeded" | "partial_failure" | "failed" | "cancelled";

export interface DispatchResult {
  dispatch_id: string;
  status: DispatchStatus;
  tasks: SubAgentTask[];
  succeeded: Array<{ task_id: string; card: KnowledgeCardDraft }>;
}

export interface DispatchOpts {
  max_concurrency?: number;
  signal?: AbortSignal;
  /** Called once per succeeded task, before the task is reported as succeeded. */
  on_result?: (task: Readonly<SubAgentTask>, card: KnowledgeCardDraft) => Promise<void> | void;
}

export interface DispatchHandle {
  readonly dispatch_id: string;
  tasks(): Readonly<SubAgentTask>[];
  cancel(reason?: string): void;
  cancelTask(task_id: string, reason?: string): boolean;
  readonly done: Promise<DispatchResult>;
}

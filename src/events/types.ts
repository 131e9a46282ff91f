import type {
  ArtifactSourceType,
  ObjectiveStatus,
  Phase,
  PhaseState,
  WaitingState,
} from "../schemas/domain.js";

/**
 * Events the engine publishes. Subscribers must not assume a global order
 * across publishers; within one publisher delivery follows publish order.
 */
export type DomainEvent =
  | {
      type: "objective-status-changed";
      objective_id: string;
      phase: Phase;
      previous: ObjectiveStatus;
      status: ObjectiveStatus;
      source: string;
      notes?: string;
    }
  | {
      type: "artifact-ingested";
      session_id: string | null;
      artifact_id: string;
      filename: string;
      source_type: ArtifactSourceType;
      created: boolean;
    }
  | {
      type: "artifact-summarized";
      artifact_id: string;
      ok: boolean;
    }
  | {
      type: "phase-changed";
      from: Phase;
      to: PhaseState;
    }
  | {
      type: "agent-progress";
      dispatch_id: string;
      task_id: string;
      status: "queued" | "running" | "succeeded" | "failed" | "cancelled";
      message?: string;
    }
  | {
      type: "tool-result";
      call_id: string;
      tool: string;
      ok: boolean;
      replayed: boolean;
    }
  | {
      type: "token-usage";
      source: "primary" | "sub-agent";
      input_tokens: number;
      output_tokens: number;
      task_id?: string;
    }
  | {
      type: "waiting-state-changed";
      previous: WaitingState | null;
      current: WaitingState | null;
    }
  | {
      type: "wizard-progress";
      phase: PhaseState;
      completed: string[];
      current: string | null;
      pending: string[];
    }
  | {
      type: "dispatch-approval-requested";
      approval_id: string;
      assignments: number;
      titles: string[];
    }
  | {
      type: "validation-draft-updated";
      validation_id: string;
      draft: Record<string, unknown>;
    }
  | {
      type: "conversation-error";
      message: string;
      retryable: boolean;
    };

/** Intents the presentation layer sends into the engine. */
export type UserIntentEvent =
  | { type: "user-message"; text: string }
  | {
      type: "upload-completed";
      upload_id: string;
      artifact_ids: string[];
    }
  | { type: "upload-cancelled"; upload_id: string; reason?: string }
  | {
      type: "validation-submitted";
      validation_id: string;
      decision: "approved" | "modified" | "rejected";
      changes?: Record<string, unknown>;
      notes?: string;
    }
  | { type: "dispatch-approved"; approval_id: string }
  | { type: "dispatch-rejected"; approval_id: string; reason?: string }
  | { type: "kill-agent"; task_id: string }
  | { type: "retry-requested" }
  | { type: "reset-requested"; reason?: string };

export type BusEvent = DomainEvent | UserIntentEvent;
export type BusEventType = BusEvent["type"];
export type EventOf<K extends BusEventType> = Extract<BusEvent, { type: K }>;
export type Handler<E> = (event: E) => void;

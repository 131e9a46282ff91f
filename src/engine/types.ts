import type { TaskAssignment } from "../agents/types.js";
import type { ArtifactStore } from "../artifacts/store.js";
import type { EngineConfig } from "../config/config.js";
import type { EventBus } from "../events/bus.js";
import type { EventOf } from "../events/types.js";
import type { ToolCall } from "../llm/types.js";
import type { ObjectiveLedger } from "../objectives/ledger.js";
import type { PhaseCoordinator } from "../phases/coordinator.js";
import type { Phase, PhaseState, WaitingState } from "../schemas/domain.js";
import type { Continuation } from "../schemas/session-snapshot.js";

/** What the conversation loop consumes, one message per step. */
export type InboundMessage =
  | EventOf<"user-message">
  | EventOf<"upload-completed">
  | EventOf<"upload-cancelled">
  | EventOf<"validation-submitted">
  | EventOf<"dispatch-approved">
  | EventOf<"dispatch-rejected">
  | EventOf<"retry-requested">
  | { type: "phase-started"; phase: Phase };

export type StepOutcome =
  | { kind: "awaiting_user"; text: string }
  | { kind: "waiting"; state: WaitingState }
  | { kind: "phase_advanced"; from: Phase; to: PhaseState }
  | { kind: "round_limit"; rounds: number }
  | { kind: "error"; message: string; retryable: boolean }
  | { kind: "interrupted"; reason: string }
  | { kind: "ignored"; reason: string }; // continuation for something no longer pending

export interface Turn {
  tool_calls: ToolCall[];
  text: string;
}

export interface InterruptResult {
  cancelled_operations: string[];
  cancelled_dispatches: string[];
  cleared_waiting: WaitingState | null;
}

export interface ResyncEntry {
  call_id: string;
  replayed: boolean; // false when the call was answered as cancelled
}

/**
 * The slice of the conversation primary tools may touch. Every mutation
 * is a single call; tools never hold state across an await.
 */
export interface ConversationHost {
  readonly session_id: string;
  readonly store: ArtifactStore;
  readonly ledger: ObjectiveLedger;
  readonly coordinator: PhaseCoordinator;
  readonly bus: EventBus;
  readonly config: EngineConfig;
  continuation(): Continuation | null;
  enterWaiting(continuation: Continuation): void;
  clearWaiting(): Continuation | null;
  notes(): string;
  setNotes(notes: string): void;
  requestDispatch(
    call_id: string,
    assignments: TaskAssignment[],
    signal: AbortSignal,
  ): Promise<unknown>;
}

export interface PrimaryToolContext {
  host: ConversationHost;
  call_id: string;
  signal: AbortSignal;
}

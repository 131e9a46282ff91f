// Orchestrator
export {
  DISPATCH_TOOL,
  type OrchestratorDeps,
  PrimaryOrchestrator,
} from "./orchestrator.js";
export { primaryTools } from "./primary-tools.js";
export type {
  ConversationHost,
  InboundMessage,
  InterruptResult,
  PrimaryToolContext,
  ResyncEntry,
  StepOutcome,
  Turn,
} from "./types.js";

// Errors
export { EngineError, type EngineErrorCode, isFatal } from "./errors.js";

// Concurrency
export { ApprovalQueue, type CreateApprovalInput } from "./approvals.js";
export { Inbox } from "./inbox.js";
export { Semaphore } from "./semaphore.js";
export {
  type BackoffConfig,
  calculateBackoff,
  DEFAULT_BACKOFF,
  sleep,
} from "./backoff.js";

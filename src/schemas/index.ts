export {
  type ArtifactSourceType,
  ArtifactSourceTypeSchema,
  isSettled,
  type ObjectiveStatus,
  ObjectiveStatusSchema,
  type Phase,
  PHASES,
  PhaseSchema,
  type PhaseState,
  PhaseStateSchema,
  type WaitingState,
  WaitingStateSchema,
} from "./domain.js";
export {
  type CardClaim,
  CardClaimSchema,
  type CardType,
  CardTypeSchema,
  EvidenceSchema,
  type KnowledgeCardDraft,
  KnowledgeCardDraftSchema,
} from "./knowledge-card.js";
export {
  ChatMessageSchema,
  type Continuation,
  ContinuationSchema,
  type DispatchApproval,
  DispatchApprovalSchema,
  type SessionSnapshot,
  SessionSnapshotSchema,
  TaskAssignmentSchema,
} from "./session-snapshot.js";
export {
  type ToolErrorKind,
  ToolErrorKindSchema,
  type ToolErrorPayload,
  ToolErrorPayloadSchema,
  type ToolOutcome,
  ToolOutcomeSchema,
} from "./tool-result.js";

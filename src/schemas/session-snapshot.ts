import { z } from "zod";
import {
  ArtifactSourceTypeSchema,
  ObjectiveStatusSchema,
  PhaseSchema,
  PhaseStateSchema,
  WaitingStateSchema,
} from "./domain.js";
import { CardTypeSchema } from "./knowledge-card.js";

const ToolCallSchema = z
  .object({
    call_id: z.string(),
    name: z.string(),
    arguments: z.string(),
  })
  .strict();

export const ChatMessageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: z.string() }).strict(),
  z.object({ role: z.literal("user"), content: z.string() }).strict(),
  z
    .object({
      role: z.literal("assistant"),
      content: z.string(),
      tool_calls: z.array(ToolCallSchema).optional(),
    })
    .strict(),
  z.object({ role: z.literal("tool"), call_id: z.string(), content: z.string() }).strict(),
]);

const ObjectiveRecordSchema = z
  .object({
    id: z.string(),
    label: z.string(),
    phase: PhaseSchema,
    status: ObjectiveStatusSchema,
    parent_id: z.string().nullable(),
    source: z.string(),
    notes: z.string().nullable(),
    completed_at: z.number().nullable(),
    updated_at: z.number(),
  })
  .strict();

const OperationRecordSchema = z
  .object({
    call_id: z.string(),
    tool: z.string(),
    arguments: z.string(),
    state: z.enum(["registered", "completed", "cancelled", "failed"]),
    output: z.string().nullable(),
    registered_at: z.number(),
    finished_at: z.number().nullable(),
  })
  .strict();

export const TaskAssignmentSchema = z
  .object({
    title: z.string().min(1),
    instructions: z.string().min(1),
    artifact_ids: z.array(z.string().min(1)).min(1),
    card_type: CardTypeSchema.optional(),
  })
  .strict();

/**
 * The user-facing continuation the conversation is paused on. Its kind is
 * the waiting state.
 */
export const ContinuationSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("upload"),
      upload_id: z.string(),
      title: z.string(),
      source_type: ArtifactSourceTypeSchema,
      objective_id: z.string().nullable(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("validation"),
      validation_id: z.string(),
      title: z.string(),
      content: z.string(),
      objective_id: z.string().nullable(),
    })
    .strict(),
  z.object({ kind: z.literal("approval"), approval_id: z.string() }).strict(),
  z.object({ kind: z.literal("processing"), approval_id: z.string() }).strict(),
]);

export const DispatchApprovalSchema = z
  .object({
    approval_id: z.string(),
    call_id: z.string(),
    assignments: z.array(TaskAssignmentSchema),
    status: z.enum(["pending", "approved", "rejected"]),
    requested_at: z.number(),
    decided_at: z.number().nullable(),
    note: z.string().nullable(),
  })
  .strict();

/**
 * Everything a restarted process needs to resume a session. Artifacts are
 * referenced by id; their content lives in the artifact store.
 */
export const SessionSnapshotSchema = z
  .object({
    session_id: z.string().min(1),
    phase: PhaseStateSchema,
    waiting_state: WaitingStateSchema.nullable(),
    continuation: ContinuationSchema.nullable(),
    objectives: z.array(ObjectiveRecordSchema),
    artifact_ids: z.array(z.string()),
    pending_operations: z.array(OperationRecordSchema),
    consumed_tools: z.array(z.string()),
    approvals: z.array(DispatchApprovalSchema),
    notes: z.string(),
    messages: z.array(ChatMessageSchema),
    updated_at: z.number(),
  })
  .strict();

export type Continuation = z.infer<typeof ContinuationSchema>;
export type DispatchApproval = z.infer<typeof DispatchApprovalSchema>;
export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

import { z } from "zod";

/** Ordered interview phases. Advancement walks this list front to back. */
export const PHASES = ["core_facts", "deep_dive", "writing_corpus"] as const;

export const PhaseSchema = z.enum(PHASES);

/** Phase plus the synthetic terminal state reached after the last phase. */
export const PhaseStateSchema = z.union([PhaseSchema, z.literal("completed")]);

export const ObjectiveStatusSchema = z.enum([
  "not_started",
  "in_progress",
  "completed",
  "skipped",
]);

/**
 * Conditions in which the conversation is paused on a user-facing
 * continuation. Only the policy's escape list for the state is callable.
 */
export const WaitingStateSchema = z.enum([
  "upload",
  "validation",
  "approval",
  "processing",
]);

export const ArtifactSourceTypeSchema = z.enum([
  "resume",
  "document",
  "web_page",
  "writing_sample",
  "knowledge_card",
  "git_repo",
  "other",
]);

export type Phase = z.infer<typeof PhaseSchema>;
export type PhaseState = z.infer<typeof PhaseStateSchema>;
export type ObjectiveStatus = z.infer<typeof ObjectiveStatusSchema>;
export type WaitingState = z.infer<typeof WaitingStateSchema>;
export type ArtifactSourceType = z.infer<typeof ArtifactSourceTypeSchema>;

/** Statuses that satisfy a phase requirement. */
export function isSettled(status: ObjectiveStatus | undefined): boolean {
  return status === "completed" || status === "skipped";
}

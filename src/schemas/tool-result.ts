import { z } from "zod";

export const ToolErrorKindSchema = z.enum([
  "tool_not_allowed",
  "unknown_tool",
  "invalid_arguments",
  "unknown_objective",
  "duplicate_objective",
  "not_found",
  "conflict",
  "cancelled",
  "execution_failed",
]);

export const ToolErrorPayloadSchema = z
  .object({
    kind: ToolErrorKindSchema,
    message: z.string(),
  })
  .strict();

/**
 * What a tool call resolves to, as serialized into the tool message the LLM
 * reads on its next turn.
 */
export const ToolOutcomeSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), data: z.unknown() }).strict(),
  z.object({ ok: z.literal(false), error: ToolErrorPayloadSchema }).strict(),
]);

export type ToolErrorKind = z.infer<typeof ToolErrorKindSchema>;
export type ToolErrorPayload = z.infer<typeof ToolErrorPayloadSchema>;
export type ToolOutcome = z.infer<typeof ToolOutcomeSchema>;

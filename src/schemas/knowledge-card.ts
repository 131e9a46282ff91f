import { z } from "zod";

export const CardTypeSchema = z.enum([
  "job",
  "skill",
  "education",
  "project",
  "employment",
  "achievement",
]);

/**
 * Evidence pointer for a single claim. `quote` must appear verbatim in the
 * referenced artifact; the dispatcher enforces that, the schema only checks
 * the shape so a missing quote is reported as missing evidence rather than
 * as a malformed payload.
 */
export const EvidenceSchema = z
  .object({
    artifact_id: z.string().min(1),
    quote: z.string().optional(),
  })
  .strict();

export const CardClaimSchema = z
  .object({
    statement: z.string().min(1),
    category: z.string().optional(),
    confidence: z.number().min(0).max(1),
    evidence: EvidenceSchema.optional(),
  })
  .strict();

export const KnowledgeCardDraftSchema = z
  .object({
    card_type: CardTypeSchema,
    title: z.string().min(1),
    summary: z.string().min(1),
    claims: z.array(CardClaimSchema).min(1),
    technologies: z.array(z.string()).default([]),
    suggested_bullets: z.array(z.string()).default([]),
  })
  .strict();

export type CardType = z.infer<typeof CardTypeSchema>;
export type CardClaim = z.infer<typeof CardClaimSchema>;
export type KnowledgeCardDraft = z.infer<typeof KnowledgeCardDraftSchema>;

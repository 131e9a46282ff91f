import type { Artifact } from "../artifacts/types.js";
import type { KnowledgeCardDraft } from "../schemas/knowledge-card.js";

export type EvidenceCheck =
  | { ok: true }
  | { ok: false; claim_index: number; message: string };

/**
 * No evidence, no claim: every claim must quote, verbatim, one of the
 * artifacts the task was given.
 */
export function checkEvidence(
  card: KnowledgeCardDraft,
  artifacts: ReadonlyMap<string, Artifact>,
): EvidenceCheck {
  for (const [claim_index, claim] of card.claims.entries()) {
    const label = `claim ${claim_index + 1} ("${claim.statement}")`;
    const evidence = claim.evidence;
    if (!evidence || evidence.quote === undefined || evidence.quote.trim() === "") {
      return { ok: false, claim_index, message: `${label} has no evidence quote` };
    }
    const artifact = artifacts.get(evidence.artifact_id);
    if (!artifact) {
      return {
        ok: false,
        claim_index,
        message: `${label} cites artifact ${evidence.artifact_id}, which is not part of this task`,
      };
    }
    if (!artifact.raw_text.includes(evidence.quote)) {
      return {
        ok: false,
        claim_index,
        message: `${label} quote does not appear verbatim in ${artifact.filename}`,
      };
    }
  }
  return { ok: true };
}

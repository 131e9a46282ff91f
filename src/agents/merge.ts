import type { ArtifactStore } from "../artifacts/store.js";
import { renderKnowledgeCard } from "../renderers/knowledge-card.js";
import type { KnowledgeCardDraft } from "../schemas/knowledge-card.js";
import type { SubAgentTask } from "./types.js";

function cardFilename(card: KnowledgeCardDraft): string {
  const slug = card.title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${card.card_type}-${slug || "card"}.md`;
}

/**
 * Result handler that stores each accepted card as a `knowledge_card`
 * artifact of the session. The structured card travels in metadata.
 */
export function storeKnowledgeCards(store: ArtifactStore, session_id: string) {
  return async (task: Readonly<SubAgentTask>, card: KnowledgeCardDraft): Promise<void> => {
    const { artifact, created } = await store.add({
      session_id,
      source_type: "knowledge_card",
      filename: cardFilename(card),
      content: renderKnowledgeCard(card),
      metadata: {
        card,
        task_id: task.task_id,
        dispatch_id: task.dispatch_id,
        evidence_artifact_ids: task.assignment.artifact_ids,
      },
    });
    console.debug(
      `[dispatcher] card ${artifact.id} ${created ? "stored" : "already present"} for ${task.task_id}`,
    );
  };
}

export { renderArtifactList } from "./artifact-list.js";
export { renderKnowledgeCard } from "./knowledge-card.js";

import type { CardClaim, KnowledgeCardDraft } from "../schemas/knowledge-card.js";

/**
 * Renders a KnowledgeCardDraft as markdown for LLM consumption.
 *
 * Claims are grouped by confidence so the interviewer sees which facts
 * still deserve a follow-up question. Every claim carries its quote.
 */
export function renderKnowledgeCard(card: KnowledgeCardDraft): string {
  const sections: string[] = [];

  sections.push(`## ${card.title} (${card.card_type})`);
  sections.push(card.summary);

  const claimSection = renderClaimsSection(card.claims);
  if (claimSection) {
    sections.push(claimSection);
  }

  if (card.technologies.length > 0) {
    sections.push(`**Technologies:** ${card.technologies.join(", ")}`);
  }

  if (card.suggested_bullets.length > 0) {
    sections.push(renderListSection("Suggested Bullets", card.suggested_bullets));
  }

  return sections.join("\n\n");
}

function renderClaimsSection(claims: CardClaim[]): string | null {
  if (claims.length === 0) return null;

  const strong = claims.filter((c) => c.confidence >= 0.7);
  const weak = claims.filter((c) => c.confidence < 0.7);

  const parts: string[] = ["### Claims"];

  if (strong.length > 0) {
    parts.push("\n**Well supported:**");
    for (const c of strong) parts.push(renderClaim(c));
  }

  if (weak.length > 0) {
    parts.push("\n**Needs confirmation:**");
    for (const c of weak) parts.push(renderClaim(c));
  }

  return parts.join("\n");
}

function renderClaim(claim: CardClaim): string {
  const evidence = claim.evidence;
  return evidence?.quote
    ? `- ${claim.statement}\n  > "${evidence.quote}" (\`${evidence.artifact_id}\`)`
    : `- ${claim.statement}`;
}

function renderListSection(title: string, items: string[]): string {
  const bullets = items.map((item) => `- ${item}`).join("\n");
  return `### ${title}\n${bullets}`;
}

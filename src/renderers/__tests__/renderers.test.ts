import { describe, expect, test } from "vitest";
import type { ArtifactView } from "../../artifacts/types.js";
import type { KnowledgeCardDraft } from "../../schemas/knowledge-card.js";
import { renderArtifactList } from "../artifact-list.js";
import { renderKnowledgeCard } from "../knowledge-card.js";

describe("renderKnowledgeCard", () => {
  test("groups claims by confidence and quotes the evidence", () => {
    const card: KnowledgeCardDraft = {
      card_type: "project",
      title: "Billing API",
      summary: "Rebuilt invoicing.",
      claims: [
        {
          statement: "Led the rewrite",
          confidence: 0.9,
          evidence: { artifact_id: "a1", quote: "led the billing rewrite" },
        },
        { statement: "Cut costs", confidence: 0.4 },
      ],
      technologies: ["TypeScript", "Postgres"],
      suggested_bullets: ["Rewrote billing in six months"],
    };

    expect(renderKnowledgeCard(card)).toBe(
      [
        "## Billing API (project)",
        "",
        "Rebuilt invoicing.",
        "",
        "### Claims",
        "",
        "**Well supported:**",
        "- Led the rewrite",
        '  > "led the billing rewrite" (`a1`)',
        "",
        "**Needs confirmation:**",
        "- Cut costs",
        "",
        "**Technologies:** TypeScript, Postgres",
        "",
        "### Suggested Bullets",
        "- Rewrote billing in six months",
      ].join("\n"),
    );
  });

  test("omits empty sections", () => {
    const card: KnowledgeCardDraft = {
      card_type: "skill",
      title: "SQL",
      summary: "Daily use.",
      claims: [{ statement: "Writes SQL", confidence: 0.8 }],
      technologies: [],
      suggested_bullets: [],
    };

    const result = renderKnowledgeCard(card);

    expect(result).not.toContain("Technologies");
    expect(result).not.toContain("Needs confirmation");
    expect(result.endsWith("- Writes SQL")).toBe(true);
  });
});

describe("renderArtifactList", () => {
  function view(overrides: Partial<ArtifactView>): ArtifactView {
    return {
      id: "a1",
      session_id: "s1",
      filename: "resume.txt",
      filename_norm: "resume.txt",
      source_type: "resume",
      content_hash: "hash",
      size_bytes: 2048,
      summary: "Ten years of backend work.",
      summary_status: "ready",
      metadata: {},
      ingested_at: 1,
      updated_at: 1,
      needs_full_fetch: false,
      ...overrides,
    };
  }

  test("lists summaries and sizes", () => {
    expect(renderArtifactList([view({}), view({ id: "a2", filename: "note.md", size_bytes: 12 })])).toBe(
      [
        "- `a1` **resume.txt** (resume, 2.0 KB)",
        "  Ten years of backend work.",
        "- `a2` **note.md** (resume, 12 B)",
        "  Ten years of backend work.",
      ].join("\n"),
    );
  });

  test("flags artifacts without a summary", () => {
    expect(renderArtifactList([view({ summary: null, summary_status: "failed", needs_full_fetch: true })])).toBe(
      "- `a1` **resume.txt** (resume, 2.0 KB)\n  _No summary available; call get_artifact for the full text._",
    );
  });

  test("renders an empty listing", () => {
    expect(renderArtifactList([])).toBe("_No artifacts._");
  });
});

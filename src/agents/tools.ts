import { z } from "zod";
import { ArtifactError } from "../artifacts/errors.js";
import { pageArtifact } from "../artifacts/paging.js";
import type { Artifact } from "../artifacts/types.js";
import {
  type KnowledgeCardDraft,
  KnowledgeCardDraftSchema,
} from "../schemas/knowledge-card.js";
import { ToolRegistry, defineTool } from "../tools/define.js";

export const SUBMIT_TOOL = "submit_result";

export interface AgentToolContext {
  /** The task's evidence; nothing outside this map is readable. */
  artifacts: ReadonlyMap<string, Artifact>;
  page_chars: number;
  submit(card: KnowledgeCardDraft): void;
}

const getArtifact = defineTool<AgentToolContext, { artifact_id: string; page: number }>({
  name: "get_artifact",
  description:
    "Read the full text of one of the artifacts assigned to this task, one page at a time.",
  args: z.object({
    artifact_id: z.string().min(1).describe("Id of an artifact assigned to this task"),
    page: z.number().int().min(1).default(1).describe("1-based page number"),
  }),
  async run(args, ctx) {
    const artifact = ctx.artifacts.get(args.artifact_id);
    if (!artifact) {
      throw new ArtifactError(
        "NOT_FOUND",
        `Artifact ${args.artifact_id} is not assigned to this task`,
      );
    }
    return pageArtifact(artifact, args.page, ctx.page_chars);
  },
});

const submitResult = defineTool<AgentToolContext, KnowledgeCardDraft>({
  name: SUBMIT_TOOL,
  description:
    "Submit the finished knowledge card. Every claim must carry a quote copied verbatim from an assigned artifact.",
  args: KnowledgeCardDraftSchema,
  async run(card, ctx) {
    ctx.submit(card);
    return { submitted: true };
  },
});

/** The restricted tool set every sub-agent session receives. */
export function agentTools(): ToolRegistry<AgentToolContext> {
  return new ToolRegistry<AgentToolContext>([getArtifact, submitResult]);
}

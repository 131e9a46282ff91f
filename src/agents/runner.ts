import type { ArtifactStore } from "../artifacts/store.js";
import type { Artifact } from "../artifacts/types.js";
import { toView } from "../artifacts/sqlite.js";
import type { EngineConfig } from "../config/config.js";
import type { EventBus } from "../events/bus.js";
import { completeWithRetry } from "../llm/retry.js";
import type { ChatMessage, LlmClient, LlmRequest, LlmResponse, ToolCall } from "../llm/types.js";
import { renderArtifactList } from "../renderers/artifact-list.js";
import type { KnowledgeCardDraft } from "../schemas/knowledge-card.js";
import type { ToolOutcome } from "../schemas/tool-result.js";
import type { ToolRegistry } from "../tools/define.js";
import { ToolError, toToolErrorPayload } from "../tools/errors.js";
import type { TaskRunner } from "./dispatcher.js";
import { AgentError } from "./errors.js";
import { checkEvidence } from "./evidence.js";
import { type AgentToolContext, SUBMIT_TOOL, agentTools } from "./tools.js";
import type { SubAgentTask, TaskAssignment } from "./types.js";

const MAX_EMPTY_REPLIES = 2;

const SYSTEM_PROMPT = [
  "You turn source documents into one knowledge card.",
  "Read the assigned artifacts with get_artifact and finish by calling submit_result.",
  "Every claim needs a quote copied verbatim from one of the assigned artifacts.",
].join("\n");

const NUDGE = "Continue with a tool call. Finish by calling submit_result.";

export type AgentRunnerConfig = Pick<
  EngineConfig,
  "agentMaxTurns" | "maxInvalidSubmissions" | "llmRetries" | "backoff" | "artifactPageChars"
>;

export interface AgentRunnerDeps {
  llm: LlmClient;
  store: ArtifactStore;
  bus: EventBus;
  config: AgentRunnerConfig;
}

function briefing(assignment: TaskAssignment, artifacts: Artifact[]): string {
  const lines = [`# ${assignment.title}`, "", assignment.instructions];
  if (assignment.card_type) lines.push("", `Card type: ${assignment.card_type}`);
  lines.push("", "## Assigned artifacts", renderArtifactList(artifacts.map(toView)));
  return lines.join("\n");
}

/**
 * Drives one isolated sub-agent session. The session sees only its own
 * briefing and the artifacts it was assigned; the primary conversation's
 * history never reaches it.
 */
export class AgentRunner implements TaskRunner {
  private readonly tools: ToolRegistry<AgentToolContext> = agentTools();

  constructor(private readonly deps: AgentRunnerDeps) {}

  get tool_set(): readonly string[] {
    return this.tools.names();
  }

  /**
   * Run the session to a single accepted card. Failures throw AgentError;
   * an abort rejects with the signal's reason. Token usage accumulates on
   * `task.usage`.
   */
  async run(task: SubAgentTask, signal: AbortSignal): Promise<KnowledgeCardDraft> {
    const { config } = this.deps;
    const artifacts = await this.loadEvidence(task.assignment.artifact_ids);
    signal.throwIfAborted();

    const messages: ChatMessage[] = [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: briefing(task.assignment, [...artifacts.values()]) },
    ];
    const submission: { card: KnowledgeCardDraft | null } = { card: null };
    const ctx: AgentToolContext = {
      artifacts,
      page_chars: config.artifactPageChars,
      submit: (card) => {
        submission.card = card;
      },
    };
    const tools = this.tools.definitions(this.tools.names());

    let invalidSubmissions = 0;
    let emptyReplies = 0;

    for (let turn = 1; turn <= config.agentMaxTurns; turn++) {
      const response = await this.complete(task, { messages, tools, tool_choice: "required" }, signal);

      if (response.tool_calls.length === 0) {
        if (response.text.trim() === "") {
          emptyReplies++;
          if (emptyReplies > MAX_EMPTY_REPLIES) {
            throw new AgentError("NO_SUBMISSION", "agent returned empty responses");
          }
        } else {
          messages.push({ role: "assistant", content: response.text });
        }
        messages.push({ role: "user", content: NUDGE });
        continue;
      }

      messages.push({ role: "assistant", content: response.text, tool_calls: response.tool_calls });
      let invalidThisTurn = false;
      for (const call of response.tool_calls) {
        const { outcome, invalid_submission } = await this.execute(call, ctx);
        if (invalid_submission) invalidThisTurn = true;
        messages.push({ role: "tool", call_id: call.call_id, content: JSON.stringify(outcome) });
        if (submission.card) break;
      }

      if (submission.card) {
        const check = checkEvidence(submission.card, artifacts);
        if (!check.ok) throw new AgentError("EVIDENCE_MISSING", check.message);
        return submission.card;
      }

      if (invalidThisTurn) {
        invalidSubmissions++;
        if (invalidSubmissions > config.maxInvalidSubmissions) {
          throw new AgentError(
            "INVALID_SUBMISSION",
            `submission failed validation ${invalidSubmissions} times`,
          );
        }
      }
    }

    throw new AgentError("MAX_TURNS", `no submission after ${config.agentMaxTurns} turns`);
  }

  private async loadEvidence(ids: string[]): Promise<Map<string, Artifact>> {
    const artifacts = new Map<string, Artifact>();
    for (const id of ids) {
      const artifact = await this.deps.store.get(id);
      if (!artifact) {
        throw new AgentError("ARTIFACT_UNAVAILABLE", `Artifact ${id} not found`);
      }
      artifacts.set(id, artifact);
    }
    return artifacts;
  }

  private async complete(
    task: SubAgentTask,
    request: LlmRequest,
    signal: AbortSignal,
  ): Promise<LlmResponse> {
    const { llm, bus, config } = this.deps;
    const response = await completeWithRetry(llm, request, {
      retries: config.llmRetries,
      backoff: config.backoff,
      signal,
      onRetry: (err, retry_count) => {
        console.warn(`[agent] ${task.task_id} retry ${retry_count} after:`, err);
      },
    });

    task.usage.input_tokens += response.usage.input_tokens;
    task.usage.output_tokens += response.usage.output_tokens;
    bus.publish({
      type: "token-usage",
      source: "sub-agent",
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
      task_id: task.task_id,
    });
    return response;
  }

  private async execute(
    call: ToolCall,
    ctx: AgentToolContext,
  ): Promise<{ outcome: ToolOutcome; invalid_submission: boolean }> {
    try {
      const tool = this.tools.get(call.name);
      if (!tool) {
        throw new ToolError("UNKNOWN_TOOL", `Unknown tool: ${call.name}`, call.name);
      }
      const data = await tool.invoke(call.arguments, ctx);
      return { outcome: { ok: true, data }, invalid_submission: false };
    } catch (err) {
      const error = toToolErrorPayload(err);
      return {
        outcome: { ok: false, error },
        invalid_submission: call.name === SUBMIT_TOOL && error.kind === "invalid_arguments",
      };
    }
  }
}

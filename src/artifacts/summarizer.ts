import type { EventBus } from "../events/bus.js";
import type { LlmClient } from "../llm/types.js";
import type { ArtifactStore } from "./store.js";
import type { Artifact } from "./types.js";

export type SummarizeFn = (artifact: Artifact, signal?: AbortSignal) => Promise<string>;

export type SummaryOutcome =
  | { artifact_id: string; ok: true; summary: string }
  | {
      artifact_id: string;
      ok: false;
      code: "SUMMARIZATION_FAILED" | "NOT_FOUND";
      message: string;
    };

/**
 * Background summarization. Jobs never reject: a failed job leaves the
 * summary null (status "failed") so listings report the artifact as
 * needing a full fetch. Concurrent requests for the same artifact share
 * one job; a later request re-runs and overwrites.
 */
export class ArtifactSummarizer {
  private inFlight = new Map<string, Promise<SummaryOutcome>>();

  constructor(
    private readonly store: ArtifactStore,
    private readonly bus: EventBus,
    private readonly summarizeFn: SummarizeFn,
  ) {}

  summarize(artifact_id: string, signal?: AbortSignal): Promise<SummaryOutcome> {
    const existing = this.inFlight.get(artifact_id);
    if (existing) return existing;

    const job = this.run(artifact_id, signal).finally(() => {
      this.inFlight.delete(artifact_id);
    });
    this.inFlight.set(artifact_id, job);
    return job;
  }

  get activeJobs(): number {
    return this.inFlight.size;
  }

  /** Resolves once every job started so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  private async run(artifact_id: string, signal?: AbortSignal): Promise<SummaryOutcome> {
    try {
      const artifact = await this.store.get(artifact_id);
      if (!artifact) {
        return {
          artifact_id,
          ok: false,
          code: "NOT_FOUND",
          message: `Artifact not found: ${artifact_id}`,
        };
      }
      const summary = await this.summarizeFn(artifact, signal);
      await this.store.setSummary(artifact_id, summary);
      this.bus.publish({ type: "artifact-summarized", artifact_id, ok: true });
      return { artifact_id, ok: true, summary };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(
        `[artifacts] summarization failed for ${artifact_id}, falling back to raw text: ${message}`,
      );
      await this.markFailed(artifact_id);
      this.bus.publish({ type: "artifact-summarized", artifact_id, ok: false });
      return { artifact_id, ok: false, code: "SUMMARIZATION_FAILED", message };
    }
  }

  private async markFailed(artifact_id: string): Promise<void> {
    try {
      await this.store.setSummary(artifact_id, null);
    } catch (err) {
      // Deleted while the job ran.
      console.warn(`[artifacts] could not mark ${artifact_id} as unsummarized:`, err);
    }
  }
}

const SUMMARY_INSTRUCTIONS =
  "Summarize the document below in plain prose for an interviewer who has not read it. " +
  "Name the document type, the people, organizations, roles and dates it mentions. " +
  "Do not add information that is not in the document.";

/**
 * Summarizer backed by the engine's LLM client. Only the head of long
 * documents is sent; the result is clipped to `maxChars`.
 */
export function llmSummarizer(
  llm: LlmClient,
  opts: { maxChars: number; sampleChars?: number },
): SummarizeFn {
  const sampleChars = opts.sampleChars ?? 24_000;
  return async (artifact, signal) => {
    const response = await llm.complete(
      {
        messages: [
          { role: "system", content: SUMMARY_INSTRUCTIONS },
          {
            role: "user",
            content: `File: ${artifact.filename}\n\n${artifact.raw_text.slice(0, sampleChars)}`,
          },
        ],
        tools: [],
        tool_choice: "none",
      },
      signal,
    );
    const text = response.text.trim();
    if (text === "") throw new Error("LLM returned an empty summary");
    return text.length > opts.maxChars ? `${text.slice(0, opts.maxChars - 1)}…` : text;
  };
}

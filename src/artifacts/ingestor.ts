import type { EventBus } from "../events/bus.js";
import type { ArtifactSourceType } from "../schemas/domain.js";
import { contentHash } from "./hash.js";
import type { ArtifactStore } from "./store.js";
import type { ArtifactSummarizer, SummaryOutcome } from "./summarizer.js";

export type TextExtractor = (raw_bytes: Uint8Array, filename: string) => Promise<string>;

export const utf8Extractor: TextExtractor = async (raw_bytes) =>
  new TextDecoder("utf-8").decode(raw_bytes);

export interface IngestResult {
  artifact_id: string;
  created: boolean;
  summary_job: Promise<SummaryOutcome> | null; // null when the artifact already existed
}

/**
 * Entry point for the document-extraction collaborator. Ingestion returns
 * as soon as the artifact is stored; summarization runs in the background.
 */
export class ArtifactIngestor {
  private readonly extract: TextExtractor;

  constructor(
    private readonly store: ArtifactStore,
    private readonly bus: EventBus,
    private readonly summarizer: ArtifactSummarizer,
    extract: TextExtractor = utf8Extractor,
  ) {
    this.extract = extract;
  }

  async ingest(
    session_id: string | null,
    filename: string,
    raw_bytes: Uint8Array,
    source_type: ArtifactSourceType,
    metadata: Record<string, unknown> = {},
  ): Promise<IngestResult> {
    const hash = contentHash(raw_bytes);

    // Skip extraction entirely for a file the session already holds.
    const existing = await this.store.existingArtifact(session_id, filename, hash);
    const { artifact, created } = existing
      ? { artifact: existing, created: false }
      : await this.store.add({
          session_id,
          source_type,
          filename,
          content: await this.extract(raw_bytes, filename),
          content_hash: hash,
          size_bytes: raw_bytes.byteLength,
          metadata,
        });

    this.bus.publish({
      type: "artifact-ingested",
      session_id,
      artifact_id: artifact.id,
      filename: artifact.filename,
      source_type: artifact.source_type,
      created,
    });

    return {
      artifact_id: artifact.id,
      created,
      summary_job: created ? this.summarizer.summarize(artifact.id) : null,
    };
  }
}

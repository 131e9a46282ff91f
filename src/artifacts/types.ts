import type { ArtifactSourceType } from "../schemas/domain.js";

export type SummaryStatus = "pending" | "ready" | "failed";

/**
 * A unit of ingested source material.
 * `session_id === null` means the artifact lives in the archive and can be
 * promoted into any session. The primary conversation only ever sees
 * `ArtifactView`s; `raw_text` is served by explicit fetches.
 */
export interface Artifact {
  // Identity
  id: string; // ULID, auto-generated
  session_id: string | null; // null = archived
  filename: string; // as provided
  filename_norm: string; // normalized for dedup/lookup

  // Content
  source_type: ArtifactSourceType;
  content_hash: string; // sha-256 hex of the raw bytes
  raw_text: string; // extracted text
  size_bytes: number; // size of the raw bytes
  summary: string | null; // null until generated, or when summarization failed
  summary_status: SummaryStatus;
  metadata: Record<string, unknown>; // classification record

  // Lifecycle
  ingested_at: number; // Unix timestamp (ms)
  updated_at: number; // Unix timestamp (ms)
}

/**
 * Listing shape. A null summary means the caller must fetch the full text
 * to learn what the artifact contains.
 */
export type ArtifactView = Omit<Artifact, "raw_text"> & {
  needs_full_fetch: boolean;
};

/**
 * Options for adding an artifact.
 * - content_hash: computed from `content` when absent
 * - size_bytes: defaults to the UTF-8 length of `content`
 */
export type AddOpts = {
  session_id: string | null;
  source_type: ArtifactSourceType;
  filename: string;
  content: string;
  content_hash?: string;
  size_bytes?: number;
  metadata?: Record<string, unknown>;
};

export type AddResult = {
  artifact: Artifact;
  created: boolean; // false when an identical artifact already existed
};

/**
 * Options for listing artifacts.
 * - session_id: only artifacts attached to that session
 * - archived: only archived artifacts (ignored when session_id is set)
 */
export type ListOpts = {
  session_id?: string;
  archived?: boolean;
  source_type?: ArtifactSourceType;
  order_by?: "ingested_at" | "updated_at"; // default: "ingested_at", always with id tie-breaker
  limit?: number; // default: 50, max: 200
  offset?: number;
};

export type ListResult = {
  items: ArtifactView[];
  pagination: {
    limit: number;
    offset: number;
    has_more: boolean;
  };
};

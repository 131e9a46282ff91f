// Types
export type {
  AddOpts,
  AddResult,
  Artifact,
  ArtifactView,
  ListOpts,
  ListResult,
  SummaryStatus,
} from "./types.js";

// Errors
export { ArtifactError } from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Interface
export type { ArtifactStore } from "./store.js";

// Implementations
export { SqliteArtifactStore, toView } from "./sqlite.js";
export {
  ArtifactIngestor,
  type IngestResult,
  type TextExtractor,
  utf8Extractor,
} from "./ingestor.js";
export {
  ArtifactSummarizer,
  llmSummarizer,
  type SummarizeFn,
  type SummaryOutcome,
} from "./summarizer.js";

// Utilities
export { type ArtifactPage, pageArtifact } from "./paging.js";
export { contentHash } from "./hash.js";
export { normalize } from "./normalize.js";

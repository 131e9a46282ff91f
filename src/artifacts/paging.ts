import type { Artifact } from "./types.js";

export interface ArtifactPage {
  artifact_id: string;
  filename: string;
  source_type: Artifact["source_type"];
  page: number; // 1-based
  page_count: number;
  text: string;
}

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

function splitsPair(text: string, index: number): boolean {
  return isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index));
}

/** Start offsets of each page. A boundary never falls inside a surrogate pair. */
function pageStarts(text: string, pageChars: number): number[] {
  const starts = [0];
  let start = 0;
  while (start + pageChars < text.length) {
    let end = start + pageChars;
    if (splitsPair(text, end)) end = end - 1 > start ? end - 1 : end + 1;
    if (end >= text.length) break;
    starts.push(end);
    start = end;
  }
  return starts;
}

/** Slice an artifact's raw text into pages of about `pageChars` UTF-16 units. Out-of-range pages clamp to the last. */
export function pageArtifact(artifact: Artifact, page: number, pageChars: number): ArtifactPage {
  const starts = pageStarts(artifact.raw_text, pageChars);
  const page_count = starts.length;
  const current = Math.min(Math.max(1, page), page_count);
  const start = starts[current - 1] ?? 0;
  const end = starts[current] ?? artifact.raw_text.length;
  return {
    artifact_id: artifact.id,
    filename: artifact.filename,
    source_type: artifact.source_type,
    page: current,
    page_count,
    text: artifact.raw_text.slice(start, end),
  };
}

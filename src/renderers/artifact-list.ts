import type { ArtifactView } from "../artifacts/types.js";

/**
 * Renders artifact listings for the primary conversation. Raw text never
 * appears here; artifacts without a summary are flagged for a full fetch.
 */
export function renderArtifactList(items: ArtifactView[]): string {
  if (items.length === 0) return "_No artifacts._";

  return items
    .map((item) => {
      const header = `- \`${item.id}\` **${item.filename}** (${item.source_type}, ${formatSize(item.size_bytes)})`;
      const body = item.summary ?? "_No summary available; call get_artifact for the full text._";
      return `${header}\n  ${body}`;
    })
    .join("\n");
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  return `${(bytes / 1024).toFixed(1)} KB`;
}

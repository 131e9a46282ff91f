import { createHash } from "node:crypto";

/** sha-256 hex digest of raw bytes or of a string's UTF-8 encoding. */
export function contentHash(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

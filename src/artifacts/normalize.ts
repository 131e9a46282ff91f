/**
 * Normalize a filename for dedup/lookup.
 *
 * Rules:
 * 1. Trim leading/trailing whitespace
 * 2. Lowercase
 * 3. Collapse internal whitespace to single spaces
 * 4. Preserve all other characters (underscores, hyphens, dots, etc.)
 *
 * Examples:
 * - "  My Resume.pdf  " → "my resume.pdf"
 * - "COVER_LETTER.txt" → "cover_letter.txt"
 */
export function normalize(s: string): string {
  return s.trim().toLowerCase().replace(/\s+/g, " ");
}

export const FALLBACK_FILENAME = "yt_download";

/**
 * Keeps letters, digits, underscores, dashes, spaces and parentheses.
 * "Song Title  (feat. Artist)" -> "Song Title (feat Artist)"
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N}_\- ()]/gu, "")
    .replace(/\s+/g, " ")
    .trim();

  return cleaned || FALLBACK_FILENAME;
}

import { transcriptErrors } from "./errors.js";

// watch?…v=ID, /v/ID, /e/ID, /embed/ID, /shorts/ID, youtu.be/ID
const VIDEO_URL_RE =
  /(?:youtube\.com\/(?:(?:v|e(?:mbed)?|shorts)\/|.*[?&]v=)|youtu\.be\/)([\w-]{11})(?![\w-])/i;

/**
 * Extract a YouTube video ID from a raw ID or common URL formats.
 *
 * Handles:
 *  - dQw4w9WgXcQ (any 11-character string is taken verbatim)
 *  - youtube.com/watch?v=ID
 *  - youtu.be/ID
 *  - youtube.com/embed/ID, /e/ID, /v/ID
 *  - youtube.com/shorts/ID
 *
 * Returns `null` when nothing matches.
 */
export function parseYouTubeVideoId(input: string): string | null {
  // Count code points, not UTF-16 units.
  if ([...input].length === 11) return input;

  const match = VIDEO_URL_RE.exec(input);
  return match?.[1] ?? null;
}

/** Like {@link parseYouTubeVideoId}, but throws an `InvalidVideoId` error. */
export function resolveVideoId(input: string): string {
  const videoId = parseYouTubeVideoId(input);
  if (!videoId) {
    throw transcriptErrors.invalidVideoId(input);
  }
  return videoId;
}

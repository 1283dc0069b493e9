import { z } from "zod";
import { transcriptErrors } from "./errors.js";
import type { CaptionTrack } from "./types.js";

export const captionTrackSchema = z.object({
  baseUrl: z.string().url(),
  languageCode: z.string(),
});

/** The `captions` object shared by the watch page and the player endpoint. */
export const captionsSchema = z.object({
  playerCaptionsTracklistRenderer: z.object({
    captionTracks: z.array(captionTrackSchema),
  }),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

/** Validate a decoded `captions` value and return its tracks in platform order. */
export function decodeCaptionTracks(value: unknown): CaptionTrack[] {
  const parsed = captionsSchema.safeParse(value);
  if (!parsed.success) {
    throw transcriptErrors.parsing(
      `Unexpected captions shape: ${formatIssues(parsed.error)}`,
      parsed.error,
    );
  }
  return parsed.data.playerCaptionsTracklistRenderer.captionTracks;
}

/**
 * Pick exactly one track.
 *
 * Without a preference the first track (the platform default) wins. With one,
 * the language code must match exactly: "en" does not select "en-US".
 */
export function selectCaptionTrack(
  tracks: readonly CaptionTrack[],
  lang: string | undefined,
  videoId: string,
): CaptionTrack {
  if (tracks.length === 0) {
    throw transcriptErrors.notAvailable(videoId);
  }
  if (lang === undefined) return tracks[0];

  const track = tracks.find((t) => t.languageCode === lang);
  if (!track) {
    throw transcriptErrors.notAvailableLanguage(
      lang,
      tracks.map((t) => t.languageCode),
      videoId,
    );
  }
  return track;
}

import { z } from "zod";
import { resolveTranscriptSettings } from "./config.js";
import type { TranscriptOptions, TranscriptSettings } from "./config.js";
import { describeError, transcriptErrors } from "./errors.js";
import { YOUTUBE_ORIGIN, readBodyText, sendRequest, watchUrl } from "./http.js";
import { runCaptionPipeline } from "./pipeline.js";
import type { CaptionTrackSource } from "./pipeline.js";
import { captionsSchema, formatIssues } from "./tracks.js";
import type { CaptionTrack, TranscriptEntry } from "./types.js";

export const INNERTUBE_PLAYER_URL = `${YOUTUBE_ORIGIN}/youtubei/v1/player`;

const playerResponseSchema = z.object({
  captions: captionsSchema.optional(),
});

export function buildPlayerRequestBody(videoId: string, settings: TranscriptSettings) {
  return {
    context: {
      client: {
        clientName: settings.innerTubeClient.clientName,
        clientVersion: settings.innerTubeClient.clientVersion,
        userAgent: settings.userAgent,
      },
    },
    videoId,
  };
}

/** Ask the private player endpoint for the caption track list. */
export const innerTubeSource: CaptionTrackSource = {
  method: "InnerTube API",

  async listTracks(videoId: string, settings: TranscriptSettings): Promise<CaptionTrack[]> {
    const res = await sendRequest(settings, INNERTUBE_PLAYER_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Origin: YOUTUBE_ORIGIN,
        Referer: watchUrl(videoId),
        ...(settings.lang !== undefined ? { "Accept-Language": settings.lang } : {}),
      },
      body: JSON.stringify(buildPlayerRequestBody(videoId, settings)),
    });
    const body = await readBodyText(res);

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw transcriptErrors.parsing(`Failed to parse player response: ${describeError(err)}`, err);
    }

    const parsed = playerResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw transcriptErrors.parsing(
        `Unexpected player response shape: ${formatIssues(parsed.error)}`,
        parsed.error,
      );
    }
    if (!parsed.data.captions) {
      throw transcriptErrors.disabled(videoId);
    }
    return parsed.data.captions.playerCaptionsTracklistRenderer.captionTracks;
  },
};

export async function fetchTranscriptWithInnerTube(
  input: string,
  opts?: TranscriptOptions,
): Promise<TranscriptEntry[]> {
  return runCaptionPipeline(innerTubeSource, input, resolveTranscriptSettings(opts));
}

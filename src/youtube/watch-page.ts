import { resolveTranscriptSettings } from "./config.js";
import type { TranscriptOptions, TranscriptSettings } from "./config.js";
import { describeError, transcriptErrors } from "./errors.js";
import { extractBetween } from "./extract.js";
import { buildHeaders, readBodyText, sendRequest, watchUrl } from "./http.js";
import { runCaptionPipeline } from "./pipeline.js";
import type { CaptionTrackSource } from "./pipeline.js";
import { decodeCaptionTracks } from "./tracks.js";
import type { CaptionTrack, TranscriptEntry } from "./types.js";

const CAPTCHA_MARKER = 'class="g-recaptcha"';
const PLAYABILITY_MARKER = '"playabilityStatus":';
const CAPTIONS_START = '"captions":';
const CAPTIONS_END = ',"videoDetails';

/** Scrape the captions block embedded in the watch page's player response. */
export const watchPageSource: CaptionTrackSource = {
  method: "HTML scraping",

  async listTracks(videoId: string, settings: TranscriptSettings): Promise<CaptionTrack[]> {
    const res = await sendRequest(settings, watchUrl(videoId), {
      headers: buildHeaders(settings),
    });
    const html = await readBodyText(res);

    if (html.includes(CAPTCHA_MARKER)) {
      throw transcriptErrors.tooManyRequests(videoId);
    }
    if (!html.includes(PLAYABILITY_MARKER)) {
      throw transcriptErrors.videoUnavailable(videoId);
    }

    const fragment = extractBetween(html, CAPTIONS_START, CAPTIONS_END);
    if (fragment === null) {
      throw transcriptErrors.disabled(videoId);
    }

    let captions: unknown;
    try {
      captions = JSON.parse(fragment);
    } catch (err) {
      throw transcriptErrors.parsing(`Failed to parse captions JSON: ${describeError(err)}`, err);
    }
    return decodeCaptionTracks(captions);
  },
};

export async function fetchTranscriptWithHtmlScraping(
  input: string,
  opts?: TranscriptOptions,
): Promise<TranscriptEntry[]> {
  return runCaptionPipeline(watchPageSource, input, resolveTranscriptSettings(opts));
}

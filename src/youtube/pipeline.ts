import type { TranscriptSettings } from "./config.js";
import { describeError, isTranscriptError, transcriptErrors } from "./errors.js";
import { buildHeaders, readBodyText, sendRequest } from "./http.js";
import { resolveVideoId } from "./parse-url.js";
import { parseTimedText } from "./timedtext.js";
import { selectCaptionTrack } from "./tracks.js";
import type { CaptionTrack, TranscriptEntry } from "./types.js";

/** One way of getting a video's caption track list. */
export interface CaptionTrackSource {
  /** Human-readable name, reported in EmptyTranscript errors. */
  readonly method: string;
  listTracks(videoId: string, settings: TranscriptSettings): Promise<CaptionTrack[]>;
}

/**
 * Resolve → list tracks → select → fetch timedtext → parse.
 *
 * Only TranscriptErrors leave this function; anything else is reported as a
 * ParsingError.
 */
export async function runCaptionPipeline(
  source: CaptionTrackSource,
  input: string,
  settings: TranscriptSettings,
): Promise<TranscriptEntry[]> {
  try {
    const videoId = resolveVideoId(input);
    settings.logger.debug(`[youtube] ${source.method}: listing caption tracks for ${videoId}`);

    const tracks = await source.listTracks(videoId, settings);
    const track = selectCaptionTrack(tracks, settings.lang, videoId);
    settings.logger.debug(
      `[youtube] ${source.method}: using "${track.languageCode}" of ${tracks.length} track(s)`,
    );

    const res = await sendRequest(settings, track.baseUrl, { headers: buildHeaders(settings) });
    if (!res.ok) {
      throw transcriptErrors.notAvailable(videoId);
    }
    const xml = await readBodyText(res);

    const entries = parseTimedText(xml, settings.lang, track.languageCode);
    if (entries.length === 0) {
      throw transcriptErrors.emptyTranscript(videoId, source.method);
    }
    return entries;
  } catch (err) {
    if (isTranscriptError(err)) throw err;
    throw transcriptErrors.parsing(describeError(err), err);
  }
}

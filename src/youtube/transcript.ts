import { resolveTranscriptSettings } from "./config.js";
import type { TranscriptOptions } from "./config.js";
import { isTranscriptError } from "./errors.js";
import { innerTubeSource } from "./innertube.js";
import { runCaptionPipeline } from "./pipeline.js";
import type { TranscriptEntry } from "./types.js";
import { watchPageSource } from "./watch-page.js";

/**
 * Fetch the caption transcript for a YouTube video ID or URL.
 *
 * Uses two strategies:
 *  1. Scrape the captions block from the watch page
 *  2. Ask the InnerTube player endpoint, only when (1) found a track whose
 *     timedtext document parsed to zero entries
 *
 * Every other failure from (1) is thrown as-is, and (2)'s result or error is
 * returned unchanged. All errors are `TranscriptError`s.
 */
export async function fetchTranscript(
  input: string,
  opts?: TranscriptOptions,
): Promise<TranscriptEntry[]> {
  const settings = resolveTranscriptSettings(opts);

  try {
    return await runCaptionPipeline(watchPageSource, input, settings);
  } catch (err) {
    if (!isTranscriptError(err, "EmptyTranscript")) throw err;

    settings.logger.warn(
      `[youtube] ${err.message}; falling back to ${innerTubeSource.method}`,
    );
    return runCaptionPipeline(innerTubeSource, input, settings);
  }
}

export { fetchTranscript } from "./transcript.js";
export { fetchTranscriptWithHtmlScraping, watchPageSource } from "./watch-page.js";
export { fetchTranscriptWithInnerTube, innerTubeSource } from "./innertube.js";
export { runCaptionPipeline } from "./pipeline.js";
export type { CaptionTrackSource } from "./pipeline.js";
export { parseYouTubeVideoId, resolveVideoId } from "./parse-url.js";
export { parseTimedText, joinTranscript } from "./timedtext.js";
export { selectCaptionTrack, decodeCaptionTracks } from "./tracks.js";
export { extractBetween } from "./extract.js";
export {
  DEFAULT_INNERTUBE_CLIENT,
  DEFAULT_USER_AGENT,
  resolveTranscriptSettings,
} from "./config.js";
export type {
  InnerTubeClient,
  TranscriptOptions,
  TranscriptSettings,
} from "./config.js";
export { TranscriptError, isTranscriptError, transcriptErrors } from "./errors.js";
export type { TranscriptErrorKind } from "./errors.js";
export type { CaptionTrack, FetchFn, TranscriptEntry, TranscriptLogger } from "./types.js";

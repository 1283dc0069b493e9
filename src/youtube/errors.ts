export type TranscriptErrorKind =
  | "InvalidVideoId"
  | "TooManyRequests"
  | "VideoUnavailable"
  | "Disabled"
  | "NotAvailable"
  | "NotAvailableLanguage"
  | "EmptyTranscript"
  | "NetworkError"
  | "ParsingError";

type TranscriptErrorContext = {
  videoId?: string;
  lang?: string;
  availableLangs?: string[];
  /** Strategy that produced the error ("HTML scraping", "InnerTube API"). */
  method?: string;
  cause?: unknown;
};

/**
 * The only error type thrown out of the transcript pipeline.
 *
 * `kind` is a closed union; switch on it rather than on `message`.
 */
export class TranscriptError extends Error {
  readonly kind: TranscriptErrorKind;
  readonly videoId?: string;
  readonly lang?: string;
  readonly availableLangs?: readonly string[];
  readonly method?: string;

  constructor(kind: TranscriptErrorKind, message: string, context: TranscriptErrorContext = {}) {
    super(message, { cause: context.cause });
    this.name = "TranscriptError";
    this.kind = kind;
    this.videoId = context.videoId;
    this.lang = context.lang;
    this.availableLangs = context.availableLangs ? [...context.availableLangs] : undefined;
    this.method = context.method;
  }
}

export const transcriptErrors = {
  invalidVideoId: (input: string) =>
    new TranscriptError("InvalidVideoId", `Could not resolve a YouTube video ID from "${input}"`),

  tooManyRequests: (videoId: string) =>
    new TranscriptError(
      "TooManyRequests",
      `YouTube is rate limiting this client and requires a captcha (${videoId})`,
      { videoId },
    ),

  videoUnavailable: (videoId: string) =>
    new TranscriptError("VideoUnavailable", `The video is no longer available (${videoId})`, {
      videoId,
    }),

  disabled: (videoId: string) =>
    new TranscriptError("Disabled", `Transcripts are disabled on this video (${videoId})`, {
      videoId,
    }),

  notAvailable: (videoId: string) =>
    new TranscriptError("NotAvailable", `No transcripts are available for this video (${videoId})`, {
      videoId,
    }),

  notAvailableLanguage: (lang: string, availableLangs: string[], videoId: string) =>
    new TranscriptError(
      "NotAvailableLanguage",
      `No transcripts are available in ${lang} for this video (${videoId}). ` +
        `Available languages: ${availableLangs.join(", ")}`,
      { lang, availableLangs, videoId },
    ),

  emptyTranscript: (videoId: string, method: string) =>
    new TranscriptError(
      "EmptyTranscript",
      `The transcript track returned no entries using ${method} (${videoId})`,
      { videoId, method },
    ),

  network: (detail: string, cause?: unknown) =>
    new TranscriptError("NetworkError", `Network error: ${detail}`, { cause }),

  parsing: (detail: string, cause?: unknown) =>
    new TranscriptError("ParsingError", `Parsing error: ${detail}`, { cause }),
};

export function isTranscriptError(value: unknown, kind?: TranscriptErrorKind): value is TranscriptError {
  return value instanceof TranscriptError && (kind === undefined || value.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

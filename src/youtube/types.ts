/** A single timed caption entry from a YouTube caption track. */
export type TranscriptEntry = {
  text: string;
  /** Seconds. */
  duration: number;
  /** Seconds from the start of the video. */
  offset: number;
  lang: string;
};

/** One caption stream offered for a video, in platform order. */
export type CaptionTrack = {
  baseUrl: string;
  languageCode: string;
};

export type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

export type TranscriptLogger = Pick<Console, "debug" | "warn">;

import type { FetchFn, TranscriptLogger } from "./types.js";

/**
 * Desktop Chrome UA. YouTube serves reduced markup to clients it doesn't
 * recognise, so the watch-page strategy depends on this looking like a browser.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export const DEFAULT_INNERTUBE_CLIENT = {
  clientName: "WEB",
  clientVersion: "2.20250312.04.00",
} as const;

export type InnerTubeClient = {
  clientName: string;
  clientVersion: string;
};

export type TranscriptOptions = {
  /** Exact caption language code (e.g. "en"). Defaults to the video's first track. */
  lang?: string;
  fetchFn?: FetchFn;
  /** Overrides YOUTUBE_TRANSCRIPT_USER_AGENT and the built-in default. */
  userAgent?: string;
  innerTubeClient?: Partial<InnerTubeClient>;
  /** Aborts any in-flight request; surfaces as a NetworkError. */
  signal?: AbortSignal;
  /** Defaults to `console.warn` for warnings; debug output is dropped. */
  logger?: TranscriptLogger;
};

export type TranscriptSettings = Readonly<{
  lang: string | undefined;
  fetchFn: FetchFn;
  userAgent: string;
  innerTubeClient: Readonly<InnerTubeClient>;
  signal: AbortSignal | undefined;
  logger: TranscriptLogger;
}>;

/** Debug output is dropped; warnings go to the console. */
const defaultLogger: TranscriptLogger = {
  debug: () => undefined,
  warn: (...args: unknown[]) => console.warn(...args),
};

function optional(name: string): string | undefined {
  return process.env[name] || undefined;
}

/** Merge per-call options, env overrides and defaults into frozen settings. */
export function resolveTranscriptSettings(opts?: TranscriptOptions): TranscriptSettings {
  return Object.freeze({
    lang: opts?.lang,
    fetchFn: opts?.fetchFn ?? globalThis.fetch,
    userAgent: opts?.userAgent ?? optional("YOUTUBE_TRANSCRIPT_USER_AGENT") ?? DEFAULT_USER_AGENT,
    innerTubeClient: Object.freeze({
      clientName:
        opts?.innerTubeClient?.clientName ??
        optional("YOUTUBE_INNERTUBE_CLIENT_NAME") ??
        DEFAULT_INNERTUBE_CLIENT.clientName,
      clientVersion:
        opts?.innerTubeClient?.clientVersion ??
        optional("YOUTUBE_INNERTUBE_CLIENT_VERSION") ??
        DEFAULT_INNERTUBE_CLIENT.clientVersion,
    }),
    signal: opts?.signal,
    logger: opts?.logger ?? defaultLogger,
  });
}

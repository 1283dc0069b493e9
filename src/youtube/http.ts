import type { TranscriptSettings } from "./config.js";
import { describeError, transcriptErrors } from "./errors.js";

export const YOUTUBE_ORIGIN = "https://www.youtube.com";

export function watchUrl(videoId: string): string {
  return `${YOUTUBE_ORIGIN}/watch?v=${encodeURIComponent(videoId)}`;
}

/** Browser UA plus `Accept-Language` when a language was requested. */
export function buildHeaders(
  settings: TranscriptSettings,
  extra?: Record<string, string>,
): Record<string, string> {
  return {
    "User-Agent": settings.userAgent,
    ...(settings.lang !== undefined ? { "Accept-Language": settings.lang } : {}),
    ...extra,
  };
}

/** One request/response exchange. Transport failures become NetworkError. */
export async function sendRequest(
  settings: TranscriptSettings,
  url: string,
  init: RequestInit = {},
): Promise<Response> {
  const { fetchFn, signal } = settings;
  try {
    return await fetchFn(url, { ...init, signal });
  } catch (err) {
    throw transcriptErrors.network(describeError(err), err);
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Buffer the whole body and decode it as strict UTF-8. */
export async function readBodyText(res: Response): Promise<string> {
  let bytes: ArrayBuffer;
  try {
    bytes = await res.arrayBuffer();
  } catch (err) {
    throw transcriptErrors.network(describeError(err), err);
  }

  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw transcriptErrors.parsing("Response body is not valid UTF-8", err);
  }
}

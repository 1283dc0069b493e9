import { vi } from "vitest";
import type { TranscriptLogger } from "./types.js";

export const VIDEO_ID = "dQw4w9WgXcQ";

export const CAPTIONS = {
  playerCaptionsTracklistRenderer: {
    captionTracks: [
      { baseUrl: "https://www.youtube.com/api/timedtext?v=test&lang=en", languageCode: "en" },
      { baseUrl: "https://www.youtube.com/api/timedtext?v=test&lang=es", languageCode: "es" },
    ],
  },
};

export const PLAYER_RESPONSE = {
  playabilityStatus: { status: "OK" },
  captions: CAPTIONS,
  videoDetails: { videoId: VIDEO_ID, title: "Test Video Title" },
};

export function makeWatchPageHtml(playerResponse: unknown): string {
  return `<!DOCTYPE html><html><head></head><body>
<script>var ytInitialPlayerResponse = ${JSON.stringify(playerResponse)};</script>
</body></html>`;
}

export const TIMED_TEXT_XML = `<?xml version="1.0" encoding="utf-8" ?>
<transcript>
  <text start="0.0" dur="2.5">Hello world</text>
  <text start="2.5" dur="3.0">This is a test &amp; demo</text>
  <text start="5.5" dur="1.5">It&#39;s working</text>
</transcript>`;

export const EMPTY_TIMED_TEXT_XML = `<?xml version="1.0" encoding="utf-8" ?><transcript></transcript>`;

export type MockFetchOverrides = {
  pageHtml?: string;
  playerBody?: string;
  /** Timedtext bodies, consumed in order; the last one repeats. */
  xmlBodies?: string[];
  xmlStatus?: number;
  /** Reject every request with this error instead of responding. */
  transportError?: Error;
};

function urlOf(input: RequestInfo | URL): string {
  return typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
}

export function createMockFetch(overrides?: MockFetchOverrides) {
  const pageHtml = overrides?.pageHtml ?? makeWatchPageHtml(PLAYER_RESPONSE);
  const playerBody = overrides?.playerBody ?? JSON.stringify(PLAYER_RESPONSE);
  const xmlBodies = overrides?.xmlBodies ?? [TIMED_TEXT_XML];
  const xmlStatus = overrides?.xmlStatus ?? 200;
  let xmlCalls = 0;

  return vi.fn(async (input: RequestInfo | URL, _init?: RequestInit) => {
    if (overrides?.transportError) throw overrides.transportError;
    const url = urlOf(input);

    if (url.includes("youtube.com/watch")) {
      return new Response(pageHtml, { status: 200 });
    }
    if (url.includes("youtubei/v1/player")) {
      return new Response(playerBody, {
        status: 200,
        headers: { "Content-Type": "application/json" },
      });
    }
    if (url.includes("timedtext")) {
      const body = xmlBodies[Math.min(xmlCalls, xmlBodies.length - 1)];
      xmlCalls++;
      return new Response(body, { status: xmlStatus });
    }
    return new Response("not found", { status: 404 });
  });
}

export type MockFetch = ReturnType<typeof createMockFetch>;

export function callsTo(fetchFn: MockFetch, fragment: string) {
  return fetchFn.mock.calls.filter((c) => urlOf(c[0]).includes(fragment));
}

export function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn() } satisfies TranscriptLogger;
}

/** The value a promise rejects with (fails the test if it resolves). */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    (value) => {
      throw new Error(`expected rejection, got ${JSON.stringify(value)}`);
    },
    (err: unknown) => err,
  );
}

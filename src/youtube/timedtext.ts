import type { TranscriptEntry } from "./types.js";

const TEXT_RE = /<text start="([^"]*)" dur="([^"]*)">([^<]*)<\/text>/g;

function toSeconds(value: string): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

// Only the three entities the timedtext endpoint emits; order matters.
function unescapeText(s: string): string {
  return s.replace(/&#39;/g, "'").replace(/&amp;/g, "&").replace(/&quot;/g, '"');
}

/**
 * Parse a timedtext XML document into transcript entries, in document order.
 *
 * Fragments that don't match `<text start=".." dur="..">..</text>` are skipped;
 * an empty result is the caller's problem.
 */
export function parseTimedText(
  xml: string,
  lang: string | undefined,
  fallbackLang: string,
): TranscriptEntry[] {
  const entries: TranscriptEntry[] = [];
  for (const m of xml.matchAll(TEXT_RE)) {
    entries.push({
      text: unescapeText(m[3]),
      duration: toSeconds(m[2]),
      offset: toSeconds(m[1]),
      lang: lang ?? fallbackLang,
    });
  }
  return entries;
}

/** Full transcript as plain text (entries joined with spaces). */
export function joinTranscript(entries: readonly TranscriptEntry[]): string {
  return entries.map((e) => e.text).join(" ");
}

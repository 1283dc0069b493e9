/**
 * Locate the text between two markers in a larger document.
 *
 * This is the one place that knows how the watch page embeds its captions JSON.
 * Returns `null` when `start` is absent. The fragment stops at the first `end`
 * or at the next `start`, whichever comes first.
 */
export function extractBetween(source: string, start: string, end: string): string | null {
  const parts = source.split(start);
  if (parts.length < 2) return null;
  return parts[1].split(end)[0];
}

import { describe, expect, it } from "vitest";
import { TranscriptError, isTranscriptError } from "./errors.js";
import { parseYouTubeVideoId, resolveVideoId } from "./parse-url.js";
import { VIDEO_ID } from "./test-fixtures.js";

describe("parseYouTubeVideoId", () => {
  it.each([
    ["raw ID", "dQw4w9WgXcQ"],
    ["standard watch URL", "https://www.youtube.com/watch?v=dQw4w9WgXcQ"],
    ["mobile URL", "https://m.youtube.com/watch?v=dQw4w9WgXcQ"],
    ["watch URL with v after other params", "https://www.youtube.com/watch?feature=share&v=dQw4w9WgXcQ"],
    ["extra query params", "https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=42s&list=PLtest"],
    ["short URL", "https://youtu.be/dQw4w9WgXcQ"],
    ["short URL with timestamp", "https://youtu.be/dQw4w9WgXcQ?t=10"],
    ["embed URL", "https://www.youtube.com/embed/dQw4w9WgXcQ"],
    ["e URL", "https://www.youtube.com/e/dQw4w9WgXcQ"],
    ["v URL", "https://www.youtube.com/v/dQw4w9WgXcQ"],
    ["shorts URL", "https://www.youtube.com/shorts/dQw4w9WgXcQ"],
    ["scheme-less URL", "youtube.com/watch?v=dQw4w9WgXcQ"],
    ["upper-case host and path", "HTTPS://WWW.YOUTUBE.COM/SHORTS/dQw4w9WgXcQ"],
  ])("extracts ID from %s", (_label, input) => {
    expect(parseYouTubeVideoId(input)).toBe(VIDEO_ID);
  });

  it("accepts IDs with hyphens and underscores", () => {
    expect(parseYouTubeVideoId("https://youtu.be/a-b_c-d_e-f")).toBe("a-b_c-d_e-f");
  });

  it("takes any 11-character string verbatim", () => {
    expect(parseYouTubeVideoId("not a vid!!")).toBe("not a vid!!");
  });

  it("counts characters rather than UTF-16 units", () => {
    expect(parseYouTubeVideoId("abcdefghij😀")).toBe("abcdefghij😀");
    expect(parseYouTubeVideoId("abcdefghi😀")).toBeNull();
  });

  it("rejects an ID run longer than 11 characters", () => {
    expect(parseYouTubeVideoId("https://www.youtube.com/watch?v=dQw4w9WgXcQxyz")).toBeNull();
  });

  it("returns null for non-YouTube URL", () => {
    expect(parseYouTubeVideoId("https://vimeo.com/123456")).toBeNull();
  });

  it("returns null for YouTube URL without video ID", () => {
    expect(parseYouTubeVideoId("https://www.youtube.com/")).toBeNull();
  });

  it("returns null for the empty string", () => {
    expect(parseYouTubeVideoId("")).toBeNull();
  });
});

describe("resolveVideoId", () => {
  it("returns the ID for a valid URL", () => {
    expect(resolveVideoId("https://youtu.be/dQw4w9WgXcQ")).toBe(VIDEO_ID);
  });

  it.each(["invalid", "https://vimeo.com/123456", "https://www.youtube.com/watch?v=short"])(
    "throws InvalidVideoId for %s",
    (input) => {
      expect(() => resolveVideoId(input)).toThrow(
        `Could not resolve a YouTube video ID from "${input}"`,
      );
      let caught: unknown;
      try {
        resolveVideoId(input);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(TranscriptError);
      expect(isTranscriptError(caught, "InvalidVideoId")).toBe(true);
    },
  );
});

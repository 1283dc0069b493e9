import { describe, expect, it } from "vitest";
import { EMPTY_TIMED_TEXT_XML, TIMED_TEXT_XML } from "./test-fixtures.js";
import { joinTranscript, parseTimedText } from "./timedtext.js";

describe("parseTimedText", () => {
  it("unescapes the three timedtext entities", () => {
    const xml = `<text start="1.5" dur="2.0">It&#39;s &amp;&quot;ok&quot;</text>`;
    expect(parseTimedText(xml, undefined, "en")).toEqual([
      { text: `It's &"ok"`, offset: 1.5, duration: 2.0, lang: "en" },
    ]);
  });

  it("keeps document order", () => {
    const entries = parseTimedText(TIMED_TEXT_XML, undefined, "en");
    expect(entries.map((e) => e.offset)).toEqual([0, 2.5, 5.5]);
    expect(entries.map((e) => e.text)).toEqual([
      "Hello world",
      "This is a test & demo",
      "It's working",
    ]);
  });

  it("tags entries with the requested language over the track's own", () => {
    const entries = parseTimedText(TIMED_TEXT_XML, "es", "en");
    expect(new Set(entries.map((e) => e.lang))).toEqual(new Set(["es"]));
  });

  it("falls back to 0 for non-numeric times", () => {
    const xml = `<text start="soon" dur="">Hi</text>`;
    expect(parseTimedText(xml, undefined, "en")).toEqual([
      { text: "Hi", offset: 0, duration: 0, lang: "en" },
    ]);
  });

  it("leaves other entities alone", () => {
    const xml = `<text start="0" dur="1">a &lt;b&gt; &#8212; c</text>`;
    expect(parseTimedText(xml, undefined, "en")[0].text).toBe("a &lt;b&gt; &#8212; c");
  });

  it("skips fragments with nested tags or extra attributes", () => {
    const xml = [
      `<text start="0" dur="1"><font color="red">x</font></text>`,
      `<text start="1" dur="1" id="2">y</text>`,
      `<text start="2" dur="1">z</text>`,
    ].join("\n");
    expect(parseTimedText(xml, undefined, "en")).toEqual([
      { text: "z", offset: 2, duration: 1, lang: "en" },
    ]);
  });

  it("returns an empty array when nothing matches", () => {
    expect(parseTimedText(EMPTY_TIMED_TEXT_XML, undefined, "en")).toEqual([]);
    expect(parseTimedText("<html>not xml</html>", "en", "en")).toEqual([]);
  });
});

describe("joinTranscript", () => {
  it("joins entry text with spaces", () => {
    const entries = parseTimedText(TIMED_TEXT_XML, undefined, "en");
    expect(joinTranscript(entries)).toBe("Hello world This is a test & demo It's working");
  });

  it("returns an empty string for no entries", () => {
    expect(joinTranscript([])).toBe("");
  });
});

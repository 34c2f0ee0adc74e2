import { describe, expect, it } from "vitest";
import { formatTranscript } from "./format.js";
import type { TranscriptionResult } from "../types.js";

describe("formatTranscript", () => {
  it("labels diarized utterances and separates them with a blank line", () => {
    const result: TranscriptionResult = {
      utterances: [
        { speaker: 0, text: "Hello, welcome to the show." },
        { speaker: 1, text: "Thank you for having me." },
      ],
    };

    expect(formatTranscript(result)).toBe(
      "[Speaker 0]: Hello, welcome to the show.\n\n[Speaker 1]: Thank you for having me.",
    );
  });

  it("prints non-diarized text without a prefix", () => {
    expect(formatTranscript({ utterances: [{ text: "This is a test." }] })).toBe("This is a test.");
  });

  it("keeps non-contiguous speaker ids as received", () => {
    const result: TranscriptionResult = {
      utterances: [
        { speaker: 3, text: "First." },
        { speaker: 0, text: "Second." },
        { speaker: 3, text: "Third." },
      ],
    };

    expect(formatTranscript(result)).toBe("[Speaker 3]: First.\n\n[Speaker 0]: Second.\n\n[Speaker 3]: Third.");
  });

  it("collapses internal whitespace and leaves punctuation alone", () => {
    const result: TranscriptionResult = { utterances: [{ speaker: 2, text: "  Well,\n  uh...   okay?!\t" }] };

    expect(formatTranscript(result)).toBe("[Speaker 2]: Well, uh... okay?!");
  });

  it("returns an empty string for no utterances", () => {
    expect(formatTranscript({ utterances: [] })).toBe("");
  });

  it("skips utterances with no text", () => {
    const result: TranscriptionResult = {
      utterances: [
        { speaker: 0, text: "   " },
        { speaker: 1, text: "Only me." },
      ],
    };

    expect(formatTranscript(result)).toBe("[Speaker 1]: Only me.");
  });

  it("is deterministic", () => {
    const result: TranscriptionResult = {
      utterances: [
        { speaker: 0, text: "One", start: 0, end: 1 },
        { speaker: 1, text: "Two", start: 1, end: 2 },
      ],
    };

    expect(formatTranscript(result)).toBe(formatTranscript(result));
  });
});

import type { TranscriptionResult, Utterance } from "../types.js";

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function formatUtterance(utterance: Utterance, text: string): string {
  return utterance.speaker === undefined ? text : `[Speaker ${utterance.speaker}]: ${text}`;
}

/**
 * Renders utterances as plain text, one block per utterance separated by a blank line.
 * Diarized utterances are prefixed with `[Speaker N]: `.
 */
export function formatTranscript(result: TranscriptionResult): string {
  const blocks: string[] = [];

  for (const utterance of result.utterances) {
    const text = normalizeWhitespace(utterance.text);
    if (text) {
      blocks.push(formatUtterance(utterance, text));
    }
  }

  return blocks.join("\n\n");
}

import { z } from "zod";
import { ResponseParseError } from "../errors.js";
import type { TranscriptionResult, Utterance } from "../types.js";

const speakerSchema = z.number().int().nonnegative();

const wordSchema = z.object({
  word: z.string(),
  punctuated_word: z.string().optional(),
  start: z.number().optional(),
  end: z.number().optional(),
  speaker: speakerSchema.optional(),
});

const listenResponseSchema = z.object({
  metadata: z
    .object({
      request_id: z.string().optional(),
      duration: z.number().optional(),
    })
    .optional(),
  results: z.object({
    channels: z
      .array(
        z.object({
          alternatives: z
            .array(
              z.object({
                transcript: z.string(),
                words: z.array(wordSchema).optional(),
              }),
            )
            .min(1),
        }),
      )
      .min(1),
    utterances: z
      .array(
        z.object({
          transcript: z.string(),
          speaker: speakerSchema.optional(),
          start: z.number().optional(),
          end: z.number().optional(),
        }),
      )
      .optional(),
  }),
});

type ListenResponse = z.infer<typeof listenResponseSchema>;
type Word = z.infer<typeof wordSchema>;

function plainTranscript(transcript: string): Utterance[] {
  return transcript.trim() ? [{ text: transcript.trim() }] : [];
}

function groupWordsBySpeaker(words: Array<Word & { speaker: number }>): Utterance[] {
  const utterances: Utterance[] = [];
  let current: Utterance | undefined;

  for (const word of words) {
    const text = (word.punctuated_word ?? word.word).trim();
    if (!text) {
      continue;
    }

    if (current && current.speaker === word.speaker) {
      current.text = `${current.text} ${text}`;
      current.end = word.end ?? current.end;
      continue;
    }

    current = { speaker: word.speaker, text, start: word.start, end: word.end };
    utterances.push(current);
  }

  return utterances;
}

function hasSpeaker<T extends { speaker?: number }>(entry: T): entry is T & { speaker: number } {
  return entry.speaker !== undefined;
}

function toUtterances(response: ListenResponse, diarization: boolean): Utterance[] {
  const alternative = response.results.channels[0].alternatives[0];
  if (!diarization) {
    return plainTranscript(alternative.transcript);
  }

  const serviceUtterances = response.results.utterances ?? [];
  const labelledUtterances = serviceUtterances.filter(hasSpeaker);
  if (labelledUtterances.length > 0 && labelledUtterances.length === serviceUtterances.length) {
    return labelledUtterances
      .filter((utterance) => utterance.transcript.trim().length > 0)
      .map((utterance) => ({
        speaker: utterance.speaker,
        text: utterance.transcript.trim(),
        start: utterance.start,
        end: utterance.end,
      }));
  }

  const words = alternative.words ?? [];
  const labelledWords = words.filter(hasSpeaker);
  if (labelledWords.length > 0 && labelledWords.length === words.length) {
    return groupWordsBySpeaker(labelledWords);
  }

  // Speaker labels missing: keep the text rather than invent speakers.
  return plainTranscript(alternative.transcript);
}

/**
 * Maps a `/v1/listen` response body onto {@link TranscriptionResult}.
 * Throws {@link ResponseParseError} when the body does not have the expected shape.
 */
export function parseListenResponse(body: unknown, diarization: boolean): TranscriptionResult {
  const parsed = listenResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ResponseParseError(
      `Unexpected transcription response shape${where}: ${issue?.message ?? "invalid body"}`,
      { cause: parsed.error },
    );
  }

  return {
    utterances: toUtterances(parsed.data, diarization),
    durationSec: parsed.data.metadata?.duration,
    requestId: parsed.data.metadata?.request_id,
  };
}

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  AuthenticationError,
  FileReadError,
  NetworkError,
  ResponseParseError,
  TranscriptionServiceError,
  describeError,
} from "../errors.js";
import { contentTypeFor } from "../media/discover.js";
import { parseListenResponse } from "./response.js";
import type { TranscriptionClient, TranscriptionRequest, TranscriptionResult } from "../types.js";

export const DEEPGRAM_BASE_URL = "https://api.deepgram.com";
export const DEFAULT_DEEPGRAM_MODEL = "nova-3";
export const DEFAULT_REQUEST_TIMEOUT_MS = 5 * 60 * 1000;

export interface DeepgramClientOptions {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const serviceErrorSchema = z.object({
  err_msg: z.string().optional(),
  message: z.string().optional(),
  reason: z.string().optional(),
});

export function buildListenUrl(
  baseUrl: string,
  model: string,
  request: Pick<TranscriptionRequest, "language" | "diarization">,
): URL {
  const url = new URL("/v1/listen", baseUrl);
  url.searchParams.set("model", model);
  url.searchParams.set("punctuate", "true");
  url.searchParams.set("smart_format", "true");
  url.searchParams.set("paragraphs", "true");

  if (request.language) {
    url.searchParams.set("language", request.language);
  }

  if (request.diarization) {
    url.searchParams.set("diarize", "true");
    url.searchParams.set("utterances", "true");
    url.searchParams.set("utt_split", "2.0");
  }

  return url;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function extractServiceMessage(bodyText: string): string {
  const parsed = serviceErrorSchema.safeParse(tryParseJson(bodyText));
  if (parsed.success) {
    const message = parsed.data.err_msg ?? parsed.data.message ?? parsed.data.reason;
    if (message) {
      return message;
    }
  }
  return bodyText.trim().slice(0, 300) || "(empty response body)";
}

async function readMedia(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new FileReadError(`Cannot read ${path.basename(filePath)}: ${describeError(error)}`, { cause: error });
  }
}

export function createDeepgramClient(options: DeepgramClientOptions = {}): TranscriptionClient {
  const baseUrl = options.baseUrl ?? DEEPGRAM_BASE_URL;
  const model = options.model ?? DEFAULT_DEEPGRAM_MODEL;
  // AbortSignal.timeout only takes whole milliseconds.
  const timeoutMs = Math.max(1, Math.round(options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS));
  const fetchImpl = options.fetch ?? fetch;

  function networkFailure(error: unknown, signal: AbortSignal | undefined, timeoutSignal: AbortSignal): NetworkError {
    if (signal?.aborted) {
      return new NetworkError("Request cancelled.", { cause: error });
    }
    if (timeoutSignal.aborted) {
      return new NetworkError(`Request timed out after ${timeoutMs} ms.`, { cause: error });
    }
    const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return new NetworkError(`Network request failed: ${describeError(error)}${cause}`, { cause: error });
  }

  return {
    async submit(request: TranscriptionRequest, signal?: AbortSignal): Promise<TranscriptionResult> {
      if (!request.apiKey.trim()) {
        throw new AuthenticationError("Deepgram API key is empty.");
      }

      const body = await readMedia(request.filePath);
      const timeoutSignal = AbortSignal.timeout(timeoutMs);
      const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

      // The body is streamed, so a reset or timeout can surface while reading it too.
      const exchange = async <T>(step: () => Promise<T>): Promise<T> => {
        try {
          return await step();
        } catch (error) {
          throw networkFailure(error, signal, timeoutSignal);
        }
      };

      const response = await exchange(() =>
        fetchImpl(buildListenUrl(baseUrl, model, request), {
          method: "POST",
          headers: {
            Authorization: `Token ${request.apiKey}`,
            "Content-Type": contentTypeFor(path.extname(request.filePath)),
          },
          body,
          signal: combined,
        }),
      );

      if (response.status === 401 || response.status === 403) {
        const message = await exchange(() => response.text()).then(
          extractServiceMessage,
          (error: unknown) => `response body unavailable (${describeError(error)})`,
        );
        throw new AuthenticationError(
          `Deepgram rejected the API key (${response.status}): ${message}. Check --api-key or DEEPGRAM_API_KEY.`,
        );
      }

      const text = await exchange(() => response.text());

      if (!response.ok) {
        throw new TranscriptionServiceError(response.status, extractServiceMessage(text));
      }

      let payload: unknown;
      try {
        payload = JSON.parse(text) as unknown;
      } catch (error) {
        throw new ResponseParseError(
          `Deepgram returned a body that is not valid JSON: ${describeError(error)}`,
          { cause: error },
        );
      }

      return parseListenResponse(payload, request.diarization);
    },
  };
}

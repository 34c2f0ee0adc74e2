import { createDeepgramClient } from "./deepgram/client.js";
import {
  AuthenticationError,
  NetworkError,
  NoSupportedFilesFoundError,
  TranscribeError,
  TranscriptionServiceError,
  describeError,
} from "./errors.js";
import { discoverMediaFiles, outputPathFor } from "./media/discover.js";
import { formatTranscript } from "./output/format.js";
import { writeTranscript } from "./output/write.js";
import { withRetry } from "./util/retry.js";
import { logger } from "./logger.js";
import type {
  BatchRunSummary,
  FailureKind,
  FileFailure,
  MediaFile,
  RuntimeConfig,
  TranscriptionClient,
} from "./types.js";

export function isTransientFailure(error: unknown): boolean {
  if (error instanceof NetworkError) {
    return true;
  }
  return error instanceof TranscriptionServiceError && (error.status === 429 || error.status >= 500);
}

function failureKind(error: unknown): FailureKind {
  if (error instanceof TranscribeError) {
    switch (error.kind) {
      case "FileReadError":
      case "NetworkError":
      case "TranscriptionServiceError":
      case "ResponseParseError":
      case "WriteError":
      case "AuthenticationError":
        return error.kind;
      default:
        return "UnexpectedError";
    }
  }
  return "UnexpectedError";
}

function toFailure(file: MediaFile, error: unknown): FileFailure {
  return { filePath: file.path, kind: failureKind(error), message: describeError(error) };
}

function warnOnOutputCollisions(files: MediaFile[], outputExtension: string): void {
  const seen = new Map<string, string>();
  for (const file of files) {
    const outputPath = outputPathFor(file, outputExtension);
    const previous = seen.get(outputPath);
    if (previous) {
      logger.warn({ outputPath, files: [previous, file.name] }, "Several inputs share one output file; the last one wins");
    }
    seen.set(outputPath, file.name);
  }
}

async function transcribeOne(
  file: MediaFile,
  config: RuntimeConfig,
  client: TranscriptionClient,
  signal: AbortSignal,
): Promise<string> {
  const result = await withRetry(
    () =>
      client.submit(
        {
          filePath: file.path,
          apiKey: config.deepgramApiKey,
          language: config.language,
          diarization: config.diarization,
        },
        signal,
      ),
    {
      maxAttempts: config.retries + 1,
      baseDelayMs: config.retryBaseDelayMs,
      signal,
      shouldRetry: isTransientFailure,
      onRetry: (error, attempt, waitMs) => {
        logger.warn({ file: file.name, attempt, waitMs, err: describeError(error) }, "Retrying transcription");
      },
    },
  );

  logger.debug(
    { file: file.name, utterances: result.utterances.length, durationSec: result.durationSec, requestId: result.requestId },
    "Transcription received",
  );

  return writeTranscript(file, formatTranscript(result), config.outputExtension);
}

export async function runBatch(
  config: RuntimeConfig,
  client: TranscriptionClient = createDeepgramClient({
    baseUrl: config.baseUrl,
    model: config.model,
    timeoutMs: Math.round(config.timeoutSec * 1000),
  }),
): Promise<BatchRunSummary> {
  logger.info({ directory: config.directoryAbsolutePath }, "Discovering media files");

  const files = await discoverMediaFiles(config.directoryAbsolutePath, config.extensions);
  if (files.length === 0) {
    throw new NoSupportedFilesFoundError(config.directoryAbsolutePath, config.extensions);
  }

  logger.info({ count: files.length }, `Found ${files.length} file(s) to transcribe`);
  warnOnOutputCollisions(files, config.outputExtension);

  const summary: BatchRunSummary = {
    directory: config.directoryAbsolutePath,
    discovered: files.length,
    attempted: 0,
    succeeded: 0,
    failed: 0,
    failures: [],
    outputs: [],
  };

  const abort = new AbortController();
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (!abort.signal.aborted && cursor < files.length) {
      const index = cursor;
      cursor += 1;
      const file = files[index];

      summary.attempted += 1;
      logger.info({ file: file.name, position: `${index + 1}/${files.length}` }, "Transcribing");

      try {
        const outputPath = await transcribeOne(file, config, client, abort.signal);
        summary.succeeded += 1;
        summary.outputs.push(outputPath);
        logger.info({ file: file.name, outputPath }, "Saved transcript");
      } catch (error) {
        if (error instanceof AuthenticationError) {
          summary.fatal ??= toFailure(file, error);
          abort.abort(error);
          logger.error({ file: file.name, err: error.message }, "Authentication failed; aborting batch");
          continue;
        }

        const failure = toFailure(file, error);
        summary.failed += 1;
        summary.failures.push(failure);
        logger.error({ file: file.name, kind: failure.kind, err: failure.message }, "Transcription failed");
      }
    }
  };

  const workerCount = Math.min(config.concurrency, files.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return summary;
}

export function exitCodeFor(summary: BatchRunSummary): number {
  return summary.fatal ? 1 : 0;
}

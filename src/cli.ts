#!/usr/bin/env node

import "dotenv/config";
import process from "node:process";
import { Command } from "commander";
import { parseCliOptions, resolveRuntimeConfig, splitList } from "./config.js";
import { DEFAULT_MEDIA_EXTENSIONS } from "./media/discover.js";
import { DEFAULT_DEEPGRAM_MODEL } from "./deepgram/client.js";
import { exitCodeFor, runBatch } from "./pipeline.js";
import { NoSupportedFilesFoundError, describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { BatchRunSummary } from "./types.js";

function reportSummary(summary: BatchRunSummary): void {
  for (const failure of summary.failures) {
    logger.warn({ file: failure.filePath, kind: failure.kind, err: failure.message }, "Not transcribed");
  }

  const fields = {
    directory: summary.directory,
    discovered: summary.discovered,
    attempted: summary.attempted,
    succeeded: summary.succeeded,
    failed: summary.failed,
  };

  if (summary.fatal) {
    logger.error(
      { ...fields, file: summary.fatal.filePath, err: summary.fatal.message },
      "Batch aborted; remaining files were not attempted",
    );
    return;
  }

  logger.info(fields, "Transcription complete");
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("transcribe-folder")
    .description("Transcribe every audio/video file in a folder with Deepgram")
    .argument("<directory>", "Folder containing audio/video files to transcribe")
    .option("-k, --api-key <key>", "Deepgram API key (defaults to DEEPGRAM_API_KEY)")
    .option("-l, --lang <code>", "Language code, e.g. en, es, fr. Auto-detected if omitted")
    .option("-d, --diarization", "Label speakers in the transcript", false)
    .option("-e, --ext <extension>", "Output file extension", "txt")
    .option("--extensions <list>", "Comma-separated input extensions", DEFAULT_MEDIA_EXTENSIONS.join(","))
    .option("--model <model>", "Deepgram model", DEFAULT_DEEPGRAM_MODEL)
    .option("--timeout <seconds>", "Per-request timeout in seconds", "300")
    .option("--retries <count>", "Extra attempts for network errors, rate limits and server errors", "0")
    .option("--concurrency <count>", "Files transcribed in parallel", "1")
    .addHelpText(
      "after",
      [
        "",
        `Supported formats: ${DEFAULT_MEDIA_EXTENSIONS.join(", ")}`,
        "",
        "Examples:",
        "  transcribe-folder ./recordings",
        "  transcribe-folder ./recordings --lang en",
        "  transcribe-folder ./recordings --diarization --ext md",
      ].join("\n"),
    );

  program.parse(process.argv);

  const raw = program.opts();
  const parsed = parseCliOptions({
    directory: program.args[0],
    apiKey: raw.apiKey,
    language: raw.lang,
    diarization: Boolean(raw.diarization),
    outputExtension: raw.ext,
    extensions: typeof raw.extensions === "string" ? splitList(raw.extensions) : undefined,
    model: raw.model,
    timeoutSec: raw.timeout,
    retries: raw.retries,
    concurrency: raw.concurrency,
  });

  const runtimeConfig = resolveRuntimeConfig(parsed, process.cwd());

  logger.info(
    {
      directory: runtimeConfig.directoryAbsolutePath,
      language: runtimeConfig.language ?? "auto",
      diarization: runtimeConfig.diarization,
      outputExtension: runtimeConfig.outputExtension,
      model: runtimeConfig.model,
      concurrency: runtimeConfig.concurrency,
    },
    "Resolved runtime configuration",
  );

  const summary = await runBatch(runtimeConfig);
  reportSummary(summary);
  process.exitCode = exitCodeFor(summary);
}

main().catch((error: unknown) => {
  if (error instanceof NoSupportedFilesFoundError) {
    logger.warn({ directory: error.directory }, error.message);
  } else {
    logger.error({ err: describeError(error) }, "Transcription failed");
  }
  process.exitCode = 1;
});

export { runBatch, exitCodeFor, isTransientFailure } from "./pipeline.js";
export { parseCliOptions, resolveRuntimeConfig } from "./config.js";
export { discoverMediaFiles, contentTypeFor, outputPathFor, DEFAULT_MEDIA_EXTENSIONS } from "./media/discover.js";
export { createDeepgramClient, buildListenUrl } from "./deepgram/client.js";
export { parseListenResponse } from "./deepgram/response.js";
export { formatTranscript } from "./output/format.js";
export { writeTranscript } from "./output/write.js";
export * from "./errors.js";
export type { DeepgramClientOptions } from "./deepgram/client.js";
export type {
  CliOptions,
  RuntimeConfig,
  MediaFile,
  TranscriptionRequest,
  TranscriptionResult,
  TranscriptionClient,
  Utterance,
  BatchRunSummary,
  FileFailure,
  FailureKind,
} from "./types.js";

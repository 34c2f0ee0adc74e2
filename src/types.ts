export interface CliOptions {
  directory: string;
  apiKey?: string;
  language?: string;
  diarization: boolean;
  outputExtension: string;
  extensions: string[];
  model: string;
  timeoutSec: number;
  retries: number;
  concurrency: number;
  baseUrl: string;
}

export interface RuntimeConfig extends Omit<CliOptions, "apiKey" | "directory"> {
  workDir: string;
  directoryAbsolutePath: string;
  deepgramApiKey: string;
  retryBaseDelayMs: number;
}

export interface MediaFile {
  path: string;
  name: string;
  stem: string;
  extension: string;
  directory: string;
}

export interface TranscriptionRequest {
  filePath: string;
  apiKey: string;
  language?: string;
  diarization: boolean;
}

export interface Utterance {
  speaker?: number;
  text: string;
  start?: number;
  end?: number;
}

export interface TranscriptionResult {
  utterances: Utterance[];
  durationSec?: number;
  requestId?: string;
}

export interface TranscriptionClient {
  submit(request: TranscriptionRequest, signal?: AbortSignal): Promise<TranscriptionResult>;
}

export type FailureKind =
  | "FileReadError"
  | "NetworkError"
  | "TranscriptionServiceError"
  | "ResponseParseError"
  | "WriteError"
  | "AuthenticationError"
  | "UnexpectedError";

export interface FileFailure {
  filePath: string;
  kind: FailureKind;
  message: string;
}

export interface BatchRunSummary {
  directory: string;
  discovered: number;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: FileFailure[];
  outputs: string[];
  fatal?: FileFailure;
}

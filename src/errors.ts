export type TranscribeErrorKind =
  | "DirectoryNotFound"
  | "NoSupportedFilesFound"
  | "AuthenticationError"
  | "FileReadError"
  | "NetworkError"
  | "TranscriptionServiceError"
  | "ResponseParseError"
  | "WriteError";

/**
 * Base class for every failure the pipeline knows how to report.
 * `fatal` errors stop the whole batch; the rest are recorded per file.
 */
export abstract class TranscribeError extends Error {
  abstract readonly kind: TranscribeErrorKind;
  readonly fatal: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DirectoryNotFoundError extends TranscribeError {
  readonly kind = "DirectoryNotFound";
  override readonly fatal = true;

  constructor(
    readonly directory: string,
    options?: { cause?: unknown },
  ) {
    super(`Folder '${directory}' does not exist or is not a directory.`, options);
  }
}

export class NoSupportedFilesFoundError extends TranscribeError {
  readonly kind = "NoSupportedFilesFound";
  override readonly fatal = true;

  constructor(
    readonly directory: string,
    readonly extensions: readonly string[],
  ) {
    super(`No supported audio/video files (${extensions.join(", ")}) found in '${directory}'.`);
  }
}

export class AuthenticationError extends TranscribeError {
  readonly kind = "AuthenticationError";
  override readonly fatal = true;
}

export class FileReadError extends TranscribeError {
  readonly kind = "FileReadError";
}

export class NetworkError extends TranscribeError {
  readonly kind = "NetworkError";
}

export class TranscriptionServiceError extends TranscribeError {
  readonly kind = "TranscriptionServiceError";

  constructor(
    readonly status: number,
    readonly serviceMessage: string,
  ) {
    super(`Transcription service responded ${status}: ${serviceMessage}`);
  }
}

export class ResponseParseError extends TranscribeError {
  readonly kind = "ResponseParseError";
}

export class WriteError extends TranscribeError {
  readonly kind = "WriteError";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

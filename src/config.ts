import path from "node:path";
import { z } from "zod";
import { AuthenticationError } from "./errors.js";
import { DEFAULT_MEDIA_EXTENSIONS, normalizeExtension } from "./media/discover.js";
import { DEEPGRAM_BASE_URL, DEFAULT_DEEPGRAM_MODEL } from "./deepgram/client.js";
import type { CliOptions, RuntimeConfig } from "./types.js";

export const API_KEY_ENV = "DEEPGRAM_API_KEY";

const DEFAULT_TIMEOUT_SEC = 300;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

const extensionSchema = z
  .string()
  .transform((value) => value.trim().replace(/^\.+/, ""))
  .pipe(z.string().regex(/^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/, "must be a plain file extension such as txt"));

const cliOptionsSchema = z.object({
  directory: z.string().min(1),
  apiKey: z.string().optional(),
  language: z
    .string()
    .regex(/^[A-Za-z]{2,8}(-[A-Za-z0-9]{1,8})*$/, "must be a language code such as en or pt-BR")
    .optional(),
  diarization: z.boolean().default(false),
  outputExtension: extensionSchema.default("txt"),
  extensions: z
    .array(z.string())
    .transform((values) => values.map(normalizeExtension).filter((value) => value.length > 0))
    .pipe(z.array(z.string()).min(1))
    .default([...DEFAULT_MEDIA_EXTENSIONS]),
  model: z.string().min(1).default(DEFAULT_DEEPGRAM_MODEL),
  timeoutSec: z.coerce.number().positive().max(86_400).default(DEFAULT_TIMEOUT_SEC),
  retries: z.coerce.number().int().min(0).max(10).default(0),
  concurrency: z.coerce.number().int().min(1).max(16).default(1),
  baseUrl: z.string().url().default(DEEPGRAM_BASE_URL),
});

export function parseCliOptions(raw: unknown): CliOptions {
  return cliOptionsSchema.parse(raw);
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Resolves the configuration once for the whole run. The API key comes from the
 * flag first, then from the environment (which dotenv fills from `.env`).
 */
export function resolveRuntimeConfig(
  options: CliOptions,
  workDir: string,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const deepgramApiKey = (options.apiKey ?? env[API_KEY_ENV] ?? "").trim();
  if (!deepgramApiKey) {
    throw new AuthenticationError(`Deepgram API key required. Set ${API_KEY_ENV} or use --api-key.`);
  }

  return {
    workDir,
    directoryAbsolutePath: path.resolve(workDir, options.directory),
    deepgramApiKey,
    language: options.language,
    diarization: options.diarization,
    outputExtension: options.outputExtension,
    extensions: options.extensions,
    model: options.model,
    timeoutSec: options.timeoutSec,
    retries: options.retries,
    concurrency: options.concurrency,
    baseUrl: options.baseUrl,
    retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  };
}

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { DirectoryNotFoundError } from "../errors.js";
import type { MediaFile } from "../types.js";

export const DEFAULT_MEDIA_EXTENSIONS: readonly string[] = ["mp4", "mp3", "wav", "m4a", "flac", "ogg", "webm"];

const contentTypes: Record<string, string> = {
  mp4: "audio/mp4",
  mp3: "audio/mpeg",
  wav: "audio/wav",
  m4a: "audio/mp4",
  flac: "audio/flac",
  ogg: "audio/ogg",
  webm: "audio/webm",
};

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, "").toLowerCase();
}

export function contentTypeFor(extension: string): string {
  return contentTypes[normalizeExtension(extension)] ?? "audio/mpeg";
}

export function outputPathFor(file: MediaFile, outputExtension: string): string {
  return path.join(file.directory, `${file.stem}.${outputExtension.replace(/^\.+/, "")}`);
}

function toMediaFile(directory: string, name: string): MediaFile {
  const parsed = path.parse(name);
  return {
    path: path.join(directory, name),
    name,
    stem: parsed.name,
    extension: normalizeExtension(parsed.ext),
    directory,
  };
}

async function isRegularFile(directory: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  // Follow links; dangling ones are skipped.
  try {
    return (await fs.stat(path.join(directory, entry.name))).isFile();
  } catch {
    return false;
  }
}

/**
 * Lists the media files (or links to files) directly inside `directory` (no recursion) whose
 * extension is one of `extensions`, compared case-insensitively.
 * Results are sorted by file name.
 */
export async function discoverMediaFiles(
  directory: string,
  extensions: readonly string[] = DEFAULT_MEDIA_EXTENSIONS,
): Promise<MediaFile[]> {
  const absoluteDirectory = path.resolve(directory);

  try {
    const stat = await fs.stat(absoluteDirectory);
    if (!stat.isDirectory()) {
      throw new DirectoryNotFoundError(absoluteDirectory);
    }
  } catch (error) {
    if (error instanceof DirectoryNotFoundError) {
      throw error;
    }
    throw new DirectoryNotFoundError(absoluteDirectory, { cause: error });
  }

  const wanted = new Set(extensions.map(normalizeExtension));
  const entries = await fs.readdir(absoluteDirectory, { withFileTypes: true });

  const fileFlags = await Promise.all(entries.map((entry) => isRegularFile(absoluteDirectory, entry)));

  return entries
    .filter((_entry, index) => fileFlags[index])
    .map((entry) => toMediaFile(absoluteDirectory, entry.name))
    .filter((file) => file.extension.length > 0 && wanted.has(file.extension))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

import fs from "node:fs/promises";
import { WriteError, describeError } from "../errors.js";
import { outputPathFor } from "../media/discover.js";
import type { MediaFile } from "../types.js";

export async function writeTranscript(file: MediaFile, transcript: string, outputExtension: string): Promise<string> {
  const outputPath = outputPathFor(file, outputExtension);

  try {
    await fs.writeFile(outputPath, transcript, "utf8");
  } catch (error) {
    throw new WriteError(`Cannot write ${outputPath}: ${describeError(error)}`, { cause: error });
  }

  return outputPath;
}

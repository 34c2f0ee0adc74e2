import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WriteError } from "../errors.js";
import { writeTranscript } from "./write.js";
import type { MediaFile } from "../types.js";

describe("writeTranscript", () => {
  let dir: string;
  let file: MediaFile;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "transcribe-folder-write-"));
    await fs.writeFile(path.join(dir, "clip.mp3"), "x");
    file = { path: path.join(dir, "clip.mp3"), name: "clip.mp3", stem: "clip", extension: "mp3", directory: dir };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes next to the source and returns the path", async () => {
    const outputPath = await writeTranscript(file, "[Speaker 0]: Hi.", "txt");

    expect(outputPath).toBe(path.join(dir, "clip.txt"));
    await expect(fs.readFile(outputPath, "utf8")).resolves.toBe("[Speaker 0]: Hi.");
  });

  it("overwrites the previous output", async () => {
    await writeTranscript(file, "first run", "txt");
    await writeTranscript(file, "second", "txt");

    expect((await fs.readdir(dir)).sort()).toEqual(["clip.mp3", "clip.txt"]);
    await expect(fs.readFile(path.join(dir, "clip.txt"), "utf8")).resolves.toBe("second");
  });

  it("ignores a leading dot in the extension", async () => {
    await expect(writeTranscript(file, "text", ".md")).resolves.toBe(path.join(dir, "clip.md"));
  });

  it("wraps file system failures in WriteError", async () => {
    await fs.mkdir(path.join(dir, "clip.txt"));

    await expect(writeTranscript(file, "text", "txt")).rejects.toBeInstanceOf(WriteError);
  });
});

/**
 * @fileoverview JSON fixtures the BFF serves in place of a photo service
 *
 * The files are returned as parsed but undecoded JSON. /api/photos and
 * /api/folders pass them through untouched so the browser's decoders see
 * exactly what's on disk (photos.json deliberately has an untitled entry).
 */

import fs from "fs/promises";
import path from "path";

export type FixtureStore = {
  readPhotos(): Promise<unknown>;
  readFolders(): Promise<unknown>;
};

async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in fixture ${filePath}: ${message}`);
  }
}

/**
 * Reads `photos.json` and `folders.json` from `dir` on every call, so edits
 * show up without a restart.
 */
export function createFixtureStore(dir: string): FixtureStore {
  return {
    readPhotos: () => readJsonFile(path.join(dir, "photos.json")),
    readFolders: () => readJsonFile(path.join(dir, "folders.json")),
  };
}

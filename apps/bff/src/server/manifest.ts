/**
 * @fileoverview Asset manifest reader
 *
 * The browser build writes hashed bundles ("app.3f2a91c0.js") plus a
 * `manifest.json` mapping logical names to their public paths:
 *
 *   { "app.js": "/assets/app.3f2a91c0.js", "app.css": "/assets/app.abc123.css" }
 *
 * The SSR handler reads it to know which <script> to put in the page.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { formatDecodeError } from "@study-archive/shared";

const manifestSchema = z.record(z.string());

export type AssetManifest = z.infer<typeof manifestSchema>;

export type ResolvedAssets = {
  mainScript: string;
  /** Null when the build emitted no stylesheet */
  mainStyle: string | null;
};

export type ManifestReader = {
  resolveAssets(): Promise<ResolvedAssets>;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * @param cacheTtlMs how long a read manifest is reused; Infinity in production
 */
export function createManifestReader(
  staticDir: string,
  cacheTtlMs: number = process.env.NODE_ENV === "production" ? Infinity : 5000
): ManifestReader {
  const manifestPath = path.join(staticDir, "manifest.json");
  let cached: { manifest: AssetManifest; readAtMs: number } | null = null;

  async function readManifest(): Promise<AssetManifest> {
    const now = Date.now();
    if (cached && now - cached.readAtMs < cacheTtlMs) {
      return cached.manifest;
    }

    let content: string;
    try {
      content = await fs.readFile(manifestPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new Error(`Manifest file not found at ${manifestPath}. Did you build the web app?`);
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in manifest file at ${manifestPath}: ${message}`);
    }

    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid manifest at ${manifestPath}: ${formatDecodeError(parsed.error)}`);
    }

    cached = { manifest: parsed.data, readAtMs: now };
    return parsed.data;
  }

  async function resolveAssets(): Promise<ResolvedAssets> {
    const manifest = await readManifest();
    const mainScript = manifest["app.js"] ?? manifest["main.js"];

    if (!mainScript) {
      const availableKeys = Object.keys(manifest).join(", ");
      throw new Error(`Could not find main script in manifest. Available entries: ${availableKeys || "(none)"}`);
    }

    return {
      mainScript,
      mainStyle: manifest["app.css"] ?? manifest["main.css"] ?? null,
    };
  }

  return { resolveAssets };
}

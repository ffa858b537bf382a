/**
 * @fileoverview Recursive folder tree over a flat photo table
 *
 * A folder is a name, some photo URLs and more folders of the same shape:
 *
 * ```
 * Photos
 * ├── 2016
 * │   ├── outdoors   [coli.jpg, yellowstone.jpg]
 * │   └── indoors    [fresco.jpg]
 * └── 2017           [turtles.jpg]
 * ```
 *
 * KEY CONCEPTS:
 *
 * 1. LOOKUP TABLE - Folders hold URLs only. The photo records live once in
 *    a flat `PhotoTable` keyed by URL, so a photo that appears in two folders
 *    is stored once and found in O(1).
 *
 * 2. PATHS - A `FolderPath` says how to walk from the root to one folder:
 *    "take subfolder 0, then subfolder 1, then stop". Updating a nested
 *    folder means rebuilding only the folders along that path.
 *
 * 3. NO CYCLE CHECKS - The tree is assumed acyclic because JSON can't
 *    express a cycle in the first place.
 */

import { z } from "zod";
import { formatDecodeError, type DecodeResult } from "../decoders/decode.js";

// ============================================================================
// TYPES
// ============================================================================

export type FolderPhoto = {
  url: string;
  title: string;
  size: number;
  relatedUrls: string[];
};

export type PhotoTable = Record<string, FolderPhoto>;

export type Folder = {
  name: string;
  photoUrls: string[];
  subfolders: Folder[];
  expanded: boolean;
};

export type FolderPath =
  | { kind: "end" }
  | { kind: "subfolder"; index: number; rest: FolderPath };

export type FolderTree = {
  root: Folder;
  photos: PhotoTable;
};

export type FolderEntry = {
  folder: Folder;
  depth: number;
  path: FolderPath;
};

// ============================================================================
// PATHS
// ============================================================================

export const END: FolderPath = { kind: "end" };

/**
 * Builds a path from a list of subfolder indexes.
 *
 * @example
 * pathFromIndexes([0, 1]);
 * // { kind: "subfolder", index: 0, rest: { kind: "subfolder", index: 1, rest: { kind: "end" } } }
 */
export function pathFromIndexes(indexes: readonly number[]): FolderPath {
  return indexes.reduceRight<FolderPath>(
    (rest, index) => ({ kind: "subfolder", index, rest }),
    END
  );
}

/** The inverse of pathFromIndexes; handy as a React key. */
export function pathToIndexes(path: FolderPath): number[] {
  const indexes: number[] = [];
  let current = path;

  while (current.kind === "subfolder") {
    indexes.push(current.index);
    current = current.rest;
  }

  return indexes;
}

function appendIndex(path: FolderPath, index: number): FolderPath {
  return pathFromIndexes([...pathToIndexes(path), index]);
}

// ============================================================================
// DECODING
// ============================================================================

/** A folder as the backend serves it: photos inline, keyed by URL. */
export type FolderJson = {
  name: string;
  photos: Record<string, { title: string; size: number; related_photos: string[] }>;
  subfolders: FolderJson[];
};

const wirePhotoSchema = z.object({
  title: z.string(),
  size: z.number(),
  related_photos: z.array(z.string()),
});

// z.lazy lets the schema refer to itself; the annotation gives it a type
export const folderJsonSchema: z.ZodType<FolderJson> = z.lazy(() =>
  z.object({
    name: z.string(),
    photos: z.record(wirePhotoSchema),
    subfolders: z.array(folderJsonSchema),
  })
);

function fromWire(wire: FolderJson, table: PhotoTable): Folder {
  for (const [url, photo] of Object.entries(wire.photos)) {
    table[url] = {
      url,
      title: photo.title,
      size: photo.size,
      relatedUrls: photo.related_photos,
    };
  }

  return {
    name: wire.name,
    photoUrls: Object.keys(wire.photos),
    subfolders: wire.subfolders.map((sub) => fromWire(sub, table)),
    expanded: true,
  };
}

/**
 * Decodes the BFF's folder JSON into a tree plus one merged photo table.
 * Every folder starts expanded.
 *
 * @example
 * decodeFolderTree({
 *   name: "Photos",
 *   photos: {},
 *   subfolders: [
 *     { name: "2016", photos: { "coli.jpg": { title: "Coli", size: 305, related_photos: [] } }, subfolders: [] },
 *   ],
 * });
 */
export function decodeFolderTree(value: unknown): DecodeResult<FolderTree> {
  const parsed = folderJsonSchema.safeParse(value);

  if (!parsed.success) {
    return { ok: false, error: formatDecodeError(parsed.error) };
  }

  const photos: PhotoTable = {};
  const root = fromWire(parsed.data, photos);

  return { ok: true, data: { root, photos } };
}

// ============================================================================
// UPDATES
// ============================================================================

/**
 * Flips `expanded` on the folder at `path`, rebuilding only the folders on
 * the way down. A path that leads nowhere returns the tree unchanged.
 */
export function toggleExpanded(path: FolderPath, folder: Folder): Folder {
  if (path.kind === "end") {
    return { ...folder, expanded: !folder.expanded };
  }

  const target = folder.subfolders[path.index];
  if (!target) {
    return folder;
  }

  const updated = toggleExpanded(path.rest, target);
  if (updated === target) {
    return folder;
  }

  return {
    ...folder,
    subfolders: folder.subfolders.map((sub, index) =>
      index === path.index ? updated : sub
    ),
  };
}

// ============================================================================
// QUERIES
// ============================================================================

export function lookupPhoto(table: PhotoTable, url: string): FolderPhoto | undefined {
  return Object.hasOwn(table, url) ? table[url] : undefined;
}

/**
 * Depth-first, pre-order listing of the folders a reader can currently
 * see. Children of a collapsed folder are skipped.
 */
export function walkFolders(root: Folder): FolderEntry[] {
  const entries: FolderEntry[] = [];

  function visit(folder: Folder, depth: number, path: FolderPath): void {
    entries.push({ folder, depth, path });

    if (!folder.expanded) return;

    folder.subfolders.forEach((sub, index) => {
      visit(sub, depth + 1, appendIndex(path, index));
    });
  }

  visit(root, 0, END);
  return entries;
}

/** Every photo URL in the tree, collapsed folders included. */
export function collectPhotoUrls(root: Folder): string[] {
  return [
    ...root.photoUrls,
    ...root.subfolders.flatMap((sub) => collectPhotoUrls(sub)),
  ];
}

/**
 * The related photos of `url` that the table knows about.
 */
export function relatedPhotos(table: PhotoTable, url: string): FolderPhoto[] {
  const photo = lookupPhoto(table, url);
  if (!photo) return [];

  return photo.relatedUrls.flatMap((relatedUrl) => {
    const related = lookupPhoto(table, relatedUrl);
    return related ? [related] : [];
  });
}

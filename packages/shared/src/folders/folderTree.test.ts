import { describe, expect, it } from "vitest";
import {
  collectPhotoUrls,
  decodeFolderTree,
  END,
  lookupPhoto,
  pathFromIndexes,
  pathToIndexes,
  relatedPhotos,
  toggleExpanded,
  walkFolders,
  type FolderTree,
} from "./folderTree.js";

const wire = {
  name: "Photos",
  photos: {},
  subfolders: [
    {
      name: "2016",
      photos: {},
      subfolders: [
        {
          name: "outdoors",
          photos: {
            "coli.jpg": { title: "Coli", size: 305, related_photos: ["yellowstone.jpg", "gone.jpg"] },
            "yellowstone.jpg": { title: "Yellowstone", size: 220, related_photos: [] },
          },
          subfolders: [],
        },
        {
          name: "indoors",
          photos: { "fresco.jpg": { title: "Fresco", size: 46, related_photos: [] } },
          subfolders: [],
        },
      ],
    },
    {
      name: "2017",
      photos: { "turtles.jpg": { title: "Turtles", size: 83, related_photos: ["coli.jpg"] } },
      subfolders: [],
    },
  ],
};

function decodedRoot(): FolderTree {
  const result = decodeFolderTree(wire);
  if (!result.ok) throw new Error(result.error);
  return result.data;
}

describe("decodeFolderTree", () => {
  it("merges every folder's photos into one table", () => {
    const { photos } = decodedRoot();

    expect(Object.keys(photos).sort()).toEqual([
      "coli.jpg",
      "fresco.jpg",
      "turtles.jpg",
      "yellowstone.jpg",
    ]);
    expect(lookupPhoto(photos, "fresco.jpg")).toEqual({
      url: "fresco.jpg",
      title: "Fresco",
      size: 46,
      relatedUrls: [],
    });
  });

  it("keeps only URLs in the folders and starts them expanded", () => {
    const { root } = decodedRoot();

    expect(root.name).toBe("Photos");
    expect(root.expanded).toBe(true);
    expect(root.subfolders[0]?.subfolders[0]?.photoUrls).toEqual(["coli.jpg", "yellowstone.jpg"]);
  });

  it("accepts a fractional photo size", () => {
    const result = decodeFolderTree({
      name: "Photos",
      photos: { "a.jpg": { title: "A", size: 12.5, related_photos: [] } },
      subfolders: [],
    });

    if (!result.ok) throw new Error(result.error);
    expect(lookupPhoto(result.data.photos, "a.jpg")?.size).toBe(12.5);
  });

  it("fails on a malformed nested folder", () => {
    const result = decodeFolderTree({
      name: "Photos",
      photos: {},
      subfolders: [{ name: "2016", photos: {}, subfolders: [{ photos: {}, subfolders: [] }] }],
    });

    expect(result).toEqual({ ok: false, error: "subfolders.0.subfolders.0.name: Required" });
  });
});

describe("paths", () => {
  it("round-trips between indexes and paths", () => {
    expect(pathFromIndexes([])).toEqual(END);
    expect(pathToIndexes(pathFromIndexes([0, 1]))).toEqual([0, 1]);
  });
});

describe("toggleExpanded", () => {
  it("collapses a nested folder without touching its siblings", () => {
    const { root } = decodedRoot();
    const updated = toggleExpanded(pathFromIndexes([0, 1]), root);

    expect(updated.subfolders[0]?.subfolders[1]?.expanded).toBe(false);
    expect(updated.subfolders[0]?.subfolders[0]).toBe(root.subfolders[0]?.subfolders[0]);
    expect(updated.subfolders[1]).toBe(root.subfolders[1]);
  });

  it("does not mutate the original tree", () => {
    const { root } = decodedRoot();
    toggleExpanded(END, root);

    expect(root.expanded).toBe(true);
  });

  it("returns the same tree for a path that leads nowhere", () => {
    const { root } = decodedRoot();

    expect(toggleExpanded(pathFromIndexes([5]), root)).toBe(root);
    expect(toggleExpanded(pathFromIndexes([1, 0]), root)).toBe(root);
  });
});

describe("walkFolders", () => {
  it("lists folders depth-first with their depth", () => {
    const { root } = decodedRoot();

    expect(walkFolders(root).map((e) => `${e.depth}:${e.folder.name}`)).toEqual([
      "0:Photos",
      "1:2016",
      "2:outdoors",
      "2:indoors",
      "1:2017",
    ]);
  });

  it("skips the children of a collapsed folder", () => {
    const { root } = decodedRoot();
    const collapsed = toggleExpanded(pathFromIndexes([0]), root);

    expect(walkFolders(collapsed).map((e) => e.folder.name)).toEqual(["Photos", "2016", "2017"]);
  });

  it("records a path that leads back to each folder", () => {
    const { root } = decodedRoot();
    const indoors = walkFolders(root)[3];

    expect(indoors && pathToIndexes(indoors.path)).toEqual([0, 1]);
  });
});

describe("collectPhotoUrls and relatedPhotos", () => {
  it("collects URLs from collapsed folders too", () => {
    const { root } = decodedRoot();
    const collapsed = toggleExpanded(pathFromIndexes([0]), root);

    expect(collectPhotoUrls(collapsed)).toEqual([
      "coli.jpg",
      "yellowstone.jpg",
      "fresco.jpg",
      "turtles.jpg",
    ]);
  });

  it("drops related URLs the table does not know", () => {
    const { photos } = decodedRoot();

    expect(relatedPhotos(photos, "coli.jpg").map((p) => p.url)).toEqual(["yellowstone.jpg"]);
    expect(relatedPhotos(photos, "missing.jpg")).toEqual([]);
  });
});

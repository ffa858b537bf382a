import { describe, expect, it, vi } from "vitest";
import { decodeFolderTree, pathFromIndexes, type DecodeResult, type FolderTree } from "@study-archive/shared";
import {
  clickedFolder,
  clickedFolderPhoto,
  foldersLoaded,
  foldersReducer,
  initialFoldersState,
  selectSelectedFolderPhoto,
} from "./foldersSlice.js";

const tree: DecodeResult<FolderTree> = decodeFolderTree({
  name: "Photos",
  photos: {},
  subfolders: [
    {
      name: "2016",
      photos: {
        "trevi.jpg": { title: "Trevi", size: 34, related_photos: ["coli.jpg"] },
      },
      subfolders: [
        {
          name: "outdoors",
          photos: { "coli.jpg": { title: "Coliseum", size: 36, related_photos: [] } },
          subfolders: [],
        },
      ],
    },
  ],
});

describe("foldersReducer", () => {
  it("shows a placeholder root before anything loads", () => {
    expect(initialFoldersState.root.name).toBe("Loading...");
    expect(initialFoldersState.selectedPhotoUrl).toBeNull();
  });

  it("replaces the tree when it decodes", () => {
    const state = foldersReducer(initialFoldersState, foldersLoaded(tree));

    expect(state.root.name).toBe("Photos");
    expect(Object.keys(state.photos).sort()).toEqual(["coli.jpg", "trevi.jpg"]);
    expect(state.loaded).toBe(true);
  });

  it("keeps the current tree when decoding failed", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const state = foldersReducer(
      initialFoldersState,
      foldersLoaded({ ok: false, error: "name: Required" })
    );

    expect(state.root).toBe(initialFoldersState.root);
    expect(state.loaded).toBe(false);
    expect(state.loadError).toBe("Could not read the folder list (name: Required)");
    expect(error).toHaveBeenCalledWith("[folders] discarding folder tree: name: Required");
  });

  it("collapses and re-expands a nested folder", () => {
    const path = pathFromIndexes([0, 0]);
    let state = foldersReducer(initialFoldersState, foldersLoaded(tree));

    state = foldersReducer(state, clickedFolder(path));
    expect(state.root.subfolders[0]?.subfolders[0]?.expanded).toBe(false);
    expect(state.root.subfolders[0]?.expanded).toBe(true);

    state = foldersReducer(state, clickedFolder(path));
    expect(state.root.subfolders[0]?.subfolders[0]?.expanded).toBe(true);
  });

  it("selects a photo by URL", () => {
    let state = foldersReducer(initialFoldersState, foldersLoaded(tree));
    state = foldersReducer(state, clickedFolderPhoto("coli.jpg"));

    expect(selectSelectedFolderPhoto({ folders: state })).toEqual({
      url: "coli.jpg",
      title: "Coliseum",
      size: 36,
      relatedUrls: [],
    });
  });

  it("selects nothing for a URL missing from the table", () => {
    const state = foldersReducer(initialFoldersState, clickedFolderPhoto("missing.jpg"));
    expect(selectSelectedFolderPhoto({ folders: state })).toBeUndefined();
  });
});

import { createSlice, current, type PayloadAction } from "@reduxjs/toolkit";
import {
  lookupPhoto,
  toggleExpanded,
  type DecodeResult,
  type Folder,
  type FolderPath,
  type FolderTree,
  type PhotoTable,
} from "@study-archive/shared";

export type FoldersState = {
  root: Folder;
  photos: PhotoTable;
  selectedPhotoUrl: string | null;
  /** True once a tree has decoded; later copies of it are ignored */
  loaded: boolean;
  /** Reader-facing message for the last tree that failed to decode */
  loadError: string | null;
};

// Shown until the tree arrives, and kept if it never decodes
export const initialFoldersState: FoldersState = {
  root: { name: "Loading...", photoUrls: [], subfolders: [], expanded: true },
  photos: {},
  selectedPhotoUrl: null,
  loaded: false,
  loadError: null,
};

const foldersSlice = createSlice({
  name: "folders",
  initialState: initialFoldersState,
  reducers: {
    foldersLoaded(state, action: PayloadAction<DecodeResult<FolderTree>>) {
      const result = action.payload;

      // A bad tree is dropped; whatever was on screen stays
      if (!result.ok) {
        console.error(`[folders] discarding folder tree: ${result.error}`);
        state.loadError = `Could not read the folder list (${result.error})`;
        return;
      }

      state.root = result.data.root;
      state.photos = result.data.photos;
      state.loaded = true;
      state.loadError = null;
    },

    clickedPhoto(state, action: PayloadAction<string>) {
      state.selectedPhotoUrl = action.payload;
    },

    clickedFolder(state, action: PayloadAction<FolderPath>) {
      state.root = toggleExpanded(action.payload, current(state.root));
    },
  },
});

export const foldersReducer = foldersSlice.reducer;

export const { foldersLoaded, clickedFolder } = foldersSlice.actions;
export const clickedFolderPhoto = foldersSlice.actions.clickedPhoto;

/**
 * The selected photo, if its URL is in the table.
 */
export function selectSelectedFolderPhoto(state: { folders: FoldersState }) {
  const { selectedPhotoUrl, photos } = state.folders;
  return selectedPhotoUrl === null ? undefined : lookupPhoto(photos, selectedPhotoUrl);
}

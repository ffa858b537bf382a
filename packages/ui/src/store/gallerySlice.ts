/**
 * @fileoverview Gallery state and its messages
 *
 * Each reducer is one message from the gallery's update loop. Immer lets
 * them read like assignments, but the state a component sees is still a
 * fresh immutable value after every dispatch.
 */

import { createSlice, type PayloadAction } from "@reduxjs/toolkit";
import {
  clampFilterValue,
  describeActivity,
  NO_FILTERS,
  type DecodeResult,
  type FilterName,
  type FilterOptions,
  type GallerySettings,
  type Photo,
  type ThumbnailSize,
} from "@study-archive/shared";

export type GalleryStatus =
  | { kind: "loading" }
  | { kind: "loaded"; photos: Photo[]; selectedUrl: string }
  | { kind: "errored"; message: string };

export type GalleryState = {
  status: GalleryStatus;
  chosenSize: ThumbnailSize;
  filters: FilterOptions;
  activity: string;
};

export const initialGalleryState: GalleryState = {
  status: { kind: "loading" },
  chosenSize: "medium",
  filters: NO_FILTERS,
  activity: "",
};

const gallerySlice = createSlice({
  name: "gallery",
  initialState: initialGalleryState,
  reducers: {
    photosLoaded(state, action: PayloadAction<DecodeResult<Photo[]>>) {
      const result = action.payload;

      if (!result.ok) {
        console.warn(`[gallery] could not decode photos: ${result.error}`);
        state.status = { kind: "errored", message: "Server error!" };
        return;
      }

      const [first] = result.data;
      state.status = first
        ? { kind: "loaded", photos: result.data, selectedUrl: first.url }
        : { kind: "errored", message: "0 photos found" };
    },

    photosFailed(state, action: PayloadAction<string>) {
      console.warn(`[gallery] photo request failed: ${action.payload}`);
      state.status = { kind: "errored", message: "Server error!" };
    },

    clickedPhoto(state, action: PayloadAction<string>) {
      if (state.status.kind === "loaded") {
        state.status.selectedUrl = action.payload;
      }
    },

    clickedSize(state, action: PayloadAction<ThumbnailSize>) {
      state.chosenSize = action.payload;
    },

    clickedSurpriseMe(state, action: PayloadAction<number>) {
      if (state.status.kind !== "loaded") return;

      const photo = state.status.photos[action.payload];
      if (photo) {
        state.status.selectedUrl = photo.url;
      }
    },

    slidFilter(state, action: PayloadAction<{ name: FilterName; value: number }>) {
      state.filters[action.payload.name] = clampFilterValue(action.payload.value);
      state.activity = describeActivity(state.filters);
    },

    settingsRestored(state, action: PayloadAction<GallerySettings>) {
      state.chosenSize = action.payload.chosenSize;
      state.filters = action.payload.filters;
    },
  },
});

export const galleryReducer = gallerySlice.reducer;

export const {
  photosLoaded,
  photosFailed,
  clickedPhoto,
  clickedSize,
  clickedSurpriseMe,
  slidFilter,
  settingsRestored,
} = gallerySlice.actions;

export const slidHue = (value: number) => slidFilter({ name: "hue", value });
export const slidRipple = (value: number) => slidFilter({ name: "ripple", value });
export const slidNoise = (value: number) => slidFilter({ name: "noise", value });

export function selectGallerySettings(state: { gallery: GalleryState }): GallerySettings {
  return { chosenSize: state.gallery.chosenSize, filters: state.gallery.filters };
}

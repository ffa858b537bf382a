import { describe, expect, it, vi } from "vitest";
import type { Photo } from "@study-archive/shared";
import {
  clickedPhoto,
  clickedSize,
  clickedSurpriseMe,
  galleryReducer,
  initialGalleryState,
  photosFailed,
  photosLoaded,
  selectGallerySettings,
  settingsRestored,
  slidHue,
  slidNoise,
  slidRipple,
  type GalleryState,
} from "./gallerySlice.js";

const photos: Photo[] = [
  { url: "1.jpeg", size: 36, title: "Beachside" },
  { url: "2.jpeg", size: 19, title: "(untitled)" },
  { url: "3.jpeg", size: 45, title: "Lighthouse" },
];

function loaded(): GalleryState {
  return galleryReducer(initialGalleryState, photosLoaded({ ok: true, data: photos }));
}

describe("galleryReducer", () => {
  it("starts loading at medium size with no filters", () => {
    expect(initialGalleryState.status).toEqual({ kind: "loading" });
    expect(initialGalleryState.chosenSize).toBe("medium");
    expect(initialGalleryState.filters).toEqual({ hue: 0, ripple: 0, noise: 0 });
  });

  it("selects the first photo when photos arrive", () => {
    expect(loaded().status).toEqual({ kind: "loaded", photos, selectedUrl: "1.jpeg" });
  });

  it("reports an empty list as an error", () => {
    const state = galleryReducer(initialGalleryState, photosLoaded({ ok: true, data: [] }));
    expect(state.status).toEqual({ kind: "errored", message: "0 photos found" });
  });

  it("shows a generic message when decoding fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const state = galleryReducer(
      initialGalleryState,
      photosLoaded({ ok: false, error: "0.size: Required" })
    );

    expect(state.status).toEqual({ kind: "errored", message: "Server error!" });
    expect(warn).toHaveBeenCalledWith("[gallery] could not decode photos: 0.size: Required");
  });

  it("shows a generic message when the request fails", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const state = galleryReducer(initialGalleryState, photosFailed("HTTP 500"));
    expect(state.status).toEqual({ kind: "errored", message: "Server error!" });
  });

  it("changes the selection on click", () => {
    const state = galleryReducer(loaded(), clickedPhoto("3.jpeg"));
    expect(state.status).toEqual({ kind: "loaded", photos, selectedUrl: "3.jpeg" });
  });

  it("ignores clicks while still loading", () => {
    expect(galleryReducer(initialGalleryState, clickedPhoto("3.jpeg"))).toEqual(
      initialGalleryState
    );
  });

  it("picks the photo at the surprise index", () => {
    const state = galleryReducer(loaded(), clickedSurpriseMe(1));
    expect(state.status).toEqual({ kind: "loaded", photos, selectedUrl: "2.jpeg" });
  });

  it("keeps the selection for an out-of-range surprise index", () => {
    const state = galleryReducer(loaded(), clickedSurpriseMe(7));
    expect(state.status).toEqual({ kind: "loaded", photos, selectedUrl: "1.jpeg" });
  });

  it("changes the thumbnail size", () => {
    expect(galleryReducer(loaded(), clickedSize("large")).chosenSize).toBe("large");
  });

  it("clamps slider values and updates the activity line", () => {
    let state = galleryReducer(loaded(), slidHue(4));
    state = galleryReducer(state, slidRipple(30));
    state = galleryReducer(state, slidNoise(-2));

    expect(state.filters).toEqual({ hue: 4, ripple: 11, noise: 0 });
    expect(state.activity).toBe("Filters: hue 4, ripple 11, noise 0");
  });

  it("round-trips settings through restore and select", () => {
    const settings = { chosenSize: "small" as const, filters: { hue: 1, ripple: 2, noise: 3 } };
    const state = galleryReducer(initialGalleryState, settingsRestored(settings));

    expect(selectGallerySettings({ gallery: state })).toEqual(settings);
  });
});

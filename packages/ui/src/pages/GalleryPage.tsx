/**
 * @fileoverview Photo gallery page
 *
 * DATA LOADING:
 * - SSR: the bootstrap payload already put the photos into the gallery
 *   slice and the RTK Query cache, so nothing is fetched.
 * - CSR: useGetPhotosQuery fetches /api/photos; the decoded result is
 *   handed to the slice once, while it is still loading.
 */
import React from "react";
import { pickRandomIndex } from "@study-archive/shared";
import { useGetPhotosQuery } from "../browserApi.js";
import { useAppDispatch, useAppSelector } from "../store/hooks.js";
import {
  clickedPhoto,
  clickedSize,
  clickedSurpriseMe,
  photosFailed,
  photosLoaded,
  slidFilter,
} from "../store/gallerySlice.js";
import { describeQueryError } from "../store/api.js";
import { PhotoGallery } from "../components/PhotoGallery.js";
import { PHOTO_URL_PREFIX } from "../config.js";

export default function GalleryPage() {
  const dispatch = useAppDispatch();
  const gallery = useAppSelector((state) => state.gallery);
  const { data, error } = useGetPhotosQuery();

  const waiting = gallery.status.kind === "loading";

  React.useEffect(() => {
    if (!waiting) return;
    if (data) {
      dispatch(photosLoaded(data));
    } else if (error) {
      dispatch(photosFailed(describeQueryError(error)));
    }
  }, [waiting, data, error, dispatch]);

  const { status } = gallery;

  return (
    <>
      <h2>Photo Gallery</h2>
      {status.kind === "loading" && <p>Loading...</p>}
      {status.kind === "errored" && <p className="error">Error: {status.message}</p>}
      {status.kind === "loaded" && (
        <PhotoGallery
          photos={status.photos}
          selectedUrl={status.selectedUrl}
          chosenSize={gallery.chosenSize}
          filters={gallery.filters}
          activity={gallery.activity}
          urlPrefix={PHOTO_URL_PREFIX}
          onClickPhoto={(url) => dispatch(clickedPhoto(url))}
          onClickSize={(size) => dispatch(clickedSize(size))}
          onSurpriseMe={() => {
            const index = pickRandomIndex(status.photos.length);
            if (index !== null) dispatch(clickedSurpriseMe(index));
          }}
          onSlide={(name, value) => dispatch(slidFilter({ name, value }))}
        />
      )}
    </>
  );
}

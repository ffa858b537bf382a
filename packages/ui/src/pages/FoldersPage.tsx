import React from "react";
import { photoSrc, relatedPhotos } from "@study-archive/shared";
import { useGetFoldersQuery } from "../browserApi.js";
import { useAppDispatch, useAppSelector } from "../store/hooks.js";
import {
  clickedFolder,
  clickedFolderPhoto,
  foldersLoaded,
  selectSelectedFolderPhoto,
} from "../store/foldersSlice.js";
import { describeQueryError } from "../store/api.js";
import { FolderTreeView } from "../components/FolderTreeView.js";
import { PHOTO_URL_PREFIX } from "../config.js";

export default function FoldersPage() {
  const dispatch = useAppDispatch();
  const folders = useAppSelector((state) => state.folders);
  const selected = useAppSelector(selectSelectedFolderPhoto);
  const { data, error } = useGetFoldersQuery();

  // Only the first tree counts: a cached copy on a later visit would
  // re-expand every folder the reader collapsed
  const waiting = !folders.loaded;

  React.useEffect(() => {
    if (waiting && data) dispatch(foldersLoaded(data));
  }, [waiting, data, dispatch]);

  React.useEffect(() => {
    if (error) console.error(`[folders] request failed: ${describeQueryError(error)}`);
  }, [error]);

  return (
    <div className="folders-page">
      <h2>Folders</h2>
      {folders.loadError !== null && <p className="error">Error: {folders.loadError}</p>}
      {waiting && error && <p className="error">Error: {describeQueryError(error)}</p>}
      <FolderTreeView
        root={folders.root}
        photos={folders.photos}
        onClickFolder={(path) => dispatch(clickedFolder(path))}
        onClickPhoto={(url) => dispatch(clickedFolderPhoto(url))}
      />
      {selected && (
        <div className="selected-photo">
          <h3>{selected.title}</h3>
          <img alt={selected.title} src={photoSrc(PHOTO_URL_PREFIX, `large/${selected.url}`)} />
          <span>{selected.size} KB</span>
          <h4>Related</h4>
          <div className="related-photos">
            {relatedPhotos(folders.photos, selected.url).map((related) => (
              <img
                key={related.url}
                className="related-photo"
                alt={related.title}
                src={photoSrc(PHOTO_URL_PREFIX, related.url)}
                onClick={() => dispatch(clickedFolderPhoto(related.url))}
              />
            ))}
          </div>
        </div>
      )}
    </div>
  );
}

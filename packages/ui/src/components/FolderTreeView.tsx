import React from "react";
import {
  END,
  lookupPhoto,
  pathFromIndexes,
  pathToIndexes,
  type Folder,
  type FolderPath,
  type PhotoTable,
} from "@study-archive/shared";

export type FolderTreeViewProps = {
  root: Folder;
  photos: PhotoTable;
  onClickFolder: (path: FolderPath) => void;
  onClickPhoto: (url: string) => void;
};

type FolderNodeProps = Omit<FolderTreeViewProps, "root"> & {
  folder: Folder;
  path: FolderPath;
};

function FolderNode({ folder, path, photos, onClickFolder, onClickPhoto }: FolderNodeProps) {
  const indexes = pathToIndexes(path);

  return (
    <div className={folder.expanded ? "folder expanded" : "folder collapsed"}>
      <button type="button" className="folder-label" onClick={() => onClickFolder(path)}>
        {folder.name}
      </button>
      {folder.expanded && (
        <>
          {folder.subfolders.map((sub, index) => (
            <FolderNode
              key={`${sub.name}-${index}`}
              folder={sub}
              path={pathFromIndexes([...indexes, index])}
              photos={photos}
              onClickFolder={onClickFolder}
              onClickPhoto={onClickPhoto}
            />
          ))}
          {folder.photoUrls.map((url) => {
            const photo = lookupPhoto(photos, url);
            return (
              <button
                key={url}
                type="button"
                className="photo"
                onClick={() => onClickPhoto(url)}
              >
                {photo ? photo.title : url}
              </button>
            );
          })}
        </>
      )}
    </div>
  );
}

/**
 * Renders the folder tree recursively, one group per folder, with photo
 * titles looked up in the flat table.
 */
export function FolderTreeView({ root, ...rest }: FolderTreeViewProps) {
  return (
    <div className="folders">
      <FolderNode folder={root} path={END} {...rest} />
    </div>
  );
}

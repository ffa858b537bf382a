import { decodeFolderTree, type BootstrapPayload } from "@study-archive/shared";
import type { ApiSlice } from "../store/api.js";
import type { AppDispatch } from "../store/store.js";
import { setBootstrap, setMessage } from "../store/appSlice.js";
import { photosLoaded } from "../store/gallerySlice.js";
import { foldersLoaded } from "../store/foldersSlice.js";
import { remoteTodosReceived } from "../store/todosSlice.js";

/**
 * Converts a bootstrap payload into store actions (mapping layer).
 *
 * Page data is also written into the RTK Query cache, so the page's query
 * hook finds it on mount and does not fetch a second time.
 */
export function applyBootstrapToStore(
  payload: BootstrapPayload,
  dispatch: AppDispatch,
  api: ApiSlice
): void {
  dispatch(setBootstrap(payload));

  switch (payload.page.kind) {
    case "gallery": {
      const result = { ok: true as const, data: payload.page.photos };
      dispatch(photosLoaded(result));
      void dispatch(api.util.upsertQueryData("getPhotos", undefined, result));
      break;
    }
    case "folders": {
      const result = decodeFolderTree(payload.page.folders);
      dispatch(foldersLoaded(result));
      void dispatch(api.util.upsertQueryData("getFolders", undefined, result));
      break;
    }
    case "todos": {
      const result = { ok: true as const, data: payload.page.todos };
      dispatch(remoteTodosReceived(result.data));
      void dispatch(api.util.upsertQueryData("getTodos", undefined, result));
      break;
    }
    case "home":
    case "error":
      break;
  }

  if (payload.page.kind !== "error") {
    dispatch(setMessage(payload.greeting));
  }
}

/**
 * @fileoverview localStorage persistence for the to-do list and gallery
 * settings
 *
 * Saved values come back in through the storage ports' decoders. A value
 * that no longer decodes (edited by hand, or written by an older version)
 * is logged and removed, and the app starts from its defaults.
 */

import {
  createStoragePort,
  encodeTodos,
  gallerySettingsSchema,
  STORAGE_KEYS,
  todoListSchema,
  type DecodeResult,
  type GallerySettings,
  type KeyValueStorage,
  type StoragePort,
  type Todo,
} from "@study-archive/shared";
import {
  selectGallerySettings,
  settingsRestored,
  todosReplaced,
  type AppDispatch,
  type AppStore,
} from "@study-archive/ui";

export type AppPorts = {
  todos: StoragePort<Todo[]>;
  gallerySettings: StoragePort<GallerySettings>;
};

export function createAppPorts(storage: KeyValueStorage): AppPorts {
  return {
    todos: createStoragePort({
      key: STORAGE_KEYS.todos,
      schema: todoListSchema,
      storage,
      encode: encodeTodos,
    }),
    gallerySettings: createStoragePort({
      key: STORAGE_KEYS.filters,
      schema: gallerySettingsSchema,
      storage,
    }),
  };
}

function loadOrClear<T>(name: string, port: StoragePort<T>): T | null {
  const result: DecodeResult<T> | null = port.load();
  if (result === null) return null;

  if (!result.ok) {
    console.warn(`[storage] discarding saved ${name}: ${result.error}`);
    port.clear();
    return null;
  }

  return result.data;
}

/**
 * Puts saved values back into the store.
 */
export function restoreSavedState(dispatch: AppDispatch, ports: AppPorts): void {
  const todos = loadOrClear("todos", ports.todos);
  if (todos !== null) {
    dispatch(todosReplaced(todos));
  }

  const settings = loadOrClear("gallery settings", ports.gallerySettings);
  if (settings !== null) {
    dispatch(settingsRestored(settings));
  }
}

/**
 * Saves a slice whenever it changes. The to-do list is only saved once the
 * reader has touched it, so the remote sample list is never pinned.
 *
 * @returns the unsubscribe function
 */
export function persistOnChange(store: AppStore["store"], ports: AppPorts): () => void {
  let lastTodos = store.getState().todos.items;
  let lastGallery = store.getState().gallery;

  return store.subscribe(() => {
    const state = store.getState();

    if (state.todos.items !== lastTodos) {
      lastTodos = state.todos.items;
      if (state.todos.touched) {
        ports.todos.save(state.todos.items);
      }
    }

    if (
      state.gallery.chosenSize !== lastGallery.chosenSize ||
      state.gallery.filters !== lastGallery.filters
    ) {
      lastGallery = state.gallery;
      ports.gallerySettings.save(selectGallerySettings(state));
    }
  });
}

import { describe, expect, it, vi } from "vitest";
import {
  makeErrorBootstrap,
  makeFoldersBootstrap,
  makeGalleryBootstrap,
  makeTodosBootstrap,
} from "@study-archive/shared";
import { createApiSlice } from "../store/api.js";
import { makeStore } from "../store/store.js";
import { applyBootstrapToStore } from "./applyBootstrapToStore.js";

function freshStore() {
  const api = createApiSlice("http://localhost/api/");
  const { store } = makeStore({ apiBaseUrl: "http://localhost/api/", api });
  return { store, api };
}

describe("applyBootstrapToStore", () => {
  it("loads gallery photos into the slice and the query cache", async () => {
    const { store, api } = freshStore();
    const photos = [{ url: "1.jpeg", size: 36, title: "Beachside" }];

    applyBootstrapToStore(makeGalleryBootstrap("/gallery", "Welcome", photos), store.dispatch, api);

    const state = store.getState();
    expect(state.gallery.status).toEqual({ kind: "loaded", photos, selectedUrl: "1.jpeg" });
    expect(state.app.message).toBe("Welcome");
    await vi.waitFor(() => {
      expect(api.endpoints.getPhotos.select()(store.getState()).data).toEqual({ ok: true, data: photos });
    });
  });

  it("decodes a folder tree into the folders slice", () => {
    const { store, api } = freshStore();
    const payload = makeFoldersBootstrap("/folders", "Welcome", {
      name: "Photos",
      photos: { "coli.jpg": { title: "Coliseum", size: 36, related_photos: [] } },
      subfolders: [],
    });

    applyBootstrapToStore(payload, store.dispatch, api);

    const { folders } = store.getState();
    expect(folders.root.name).toBe("Photos");
    expect(folders.root.photoUrls).toEqual(["coli.jpg"]);
  });

  it("seeds the todo list", () => {
    const { store, api } = freshStore();
    const todos = [{ id: 4, title: "Read chapter 5", completed: false }];

    applyBootstrapToStore(makeTodosBootstrap("/todos", "Welcome back", todos), store.dispatch, api);

    expect(store.getState().todos.items).toEqual(todos);
    expect(store.getState().todos.nextId).toBe(5);
  });

  it("keeps the greeting unset for an error page", () => {
    const { store, api } = freshStore();

    applyBootstrapToStore(makeErrorBootstrap("/gallery"), store.dispatch, api);

    expect(store.getState().app.message).toBeNull();
    expect(store.getState().app.bootstrap?.page.kind).toBe("error");
  });
});

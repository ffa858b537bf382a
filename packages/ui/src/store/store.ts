import { configureStore, combineReducers } from "@reduxjs/toolkit";
import { createApiSlice, type ApiSlice } from "./api.js";
import { appReducer } from "./appSlice.js";
import { galleryReducer } from "./gallerySlice.js";
import { foldersReducer } from "./foldersSlice.js";
import { todosReducer } from "./todosSlice.js";

function buildRootReducer(api: ApiSlice) {
  return combineReducers({
    app: appReducer,
    gallery: galleryReducer,
    folders: foldersReducer,
    todos: todosReducer,
    [api.reducerPath]: api.reducer,
  });
}

export type RootState = ReturnType<ReturnType<typeof buildRootReducer>>;

type MakeStoreOptions = {
  apiBaseUrl: string;
  preloadedState?: Partial<RootState>;
  api?: ApiSlice;
};

export function makeStore(opts: MakeStoreOptions) {
  const api = opts.api ?? createApiSlice(opts.apiBaseUrl);

  const store = configureStore({
    reducer: buildRootReducer(api),
    middleware: (getDefault) => getDefault().concat(api.middleware),
    ...(opts.preloadedState ? { preloadedState: opts.preloadedState } : {}),
    devTools: process.env.NODE_ENV !== "production",
  });
  return { store, api };
}

export { setMessage, setBootstrap } from "./appSlice.js";

export type AppStore = ReturnType<typeof makeStore>;
export type AppDispatch = AppStore["store"]["dispatch"];

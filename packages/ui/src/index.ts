export { App } from "./App.js";
export * from "./store/store.js";
export * from "./store/api.js";
export { settingsRestored, selectGallerySettings } from "./store/gallerySlice.js";
export { todosReplaced } from "./store/todosSlice.js";
export * from "./bootstrap/applyBootstrapToStore.js";
export { ErrorBoundary } from "./components/ErrorBoundary.js";
export { PHOTO_URL_PREFIX } from "./config.js";
export { browserApi as api } from "./browserApi.js";

export * from "./gallery.js";
export * from "./settings.js";

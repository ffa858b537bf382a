export * from "./scores.js";

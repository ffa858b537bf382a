export * from "./folderTree.js";

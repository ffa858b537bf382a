export * from "./storagePort.js";

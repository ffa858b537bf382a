export * from "./signup.js";

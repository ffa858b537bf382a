export * from "./todos.js";
export * from "./profile.js";

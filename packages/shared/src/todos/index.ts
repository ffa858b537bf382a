export * from "./todoList.js";

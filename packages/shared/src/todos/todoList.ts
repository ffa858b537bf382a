/**
 * @fileoverview Pure helpers for the local to-do list
 *
 * The list state itself lives in a Redux slice (@study-archive/ui); these
 * are the bits of logic worth testing without a store.
 */

import type { Todo } from "../types/bootstrap.js";

export type TodoFilter = "all" | "active" | "completed";

export const TODO_FILTERS: readonly TodoFilter[] = ["all", "active", "completed"];

/**
 * The id the next new item should get: one past the largest id, or 1 for an
 * empty list. Ids from a saved list are kept, so new items never collide.
 */
export function nextTodoId(todos: readonly Todo[]): number {
  return todos.reduce((max, todo) => Math.max(max, todo.id), 0) + 1;
}

export function filterTodos(todos: readonly Todo[], filter: TodoFilter): Todo[] {
  switch (filter) {
    case "all":
      return [...todos];
    case "active":
      return todos.filter((todo) => !todo.completed);
    case "completed":
      return todos.filter((todo) => todo.completed);
  }
}

/** `"1 item left"` / `"3 items left"` */
export function describeRemaining(todos: readonly Todo[]): string {
  const remaining = todos.filter((todo) => !todo.completed).length;
  return `${remaining} ${remaining === 1 ? "item" : "items"} left`;
}

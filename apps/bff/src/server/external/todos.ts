/**
 * @fileoverview The remote sample to-do list (JSONPlaceholder by default)
 */

import { decodeValue, todoListSchema, type Todo } from "@study-archive/shared";
import type { HttpClient } from "../httpClient.js";

const REQUEST_OPTIONS = {
  timeoutMs: 1500,
  retries: 1,
} as const;

export const DEFAULT_TODO_LIMIT = 5;

/**
 * Fetches the first `limit` todos. Extra upstream fields such as `userId`
 * are dropped by the decoder.
 *
 * @throws Error when the call fails or the body isn't a todo list
 *
 * @example
 * const todos = await getTodos(http, { baseUrl: config.todosApiBaseUrl });
 */
export async function getTodos(
  http: HttpClient,
  opts: { baseUrl: string; limit?: number }
): Promise<Todo[]> {
  const limit = opts.limit ?? DEFAULT_TODO_LIMIT;
  const raw = await http.getJson(`${opts.baseUrl}/todos?_limit=${limit}`, REQUEST_OPTIONS);

  const decoded = decodeValue(todoListSchema, raw);
  if (!decoded.ok) {
    throw new Error(`Unexpected todos response: ${decoded.error}`);
  }

  return decoded.data;
}

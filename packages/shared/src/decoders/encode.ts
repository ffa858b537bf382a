/**
 * @fileoverview Encoders: typed values back to JSON
 *
 * Decoders have a mirror image. When a value goes out through a port or
 * into localStorage, we choose its JSON shape explicitly instead of
 * stringifying whatever object happens to be in memory.
 */

import type { Todo } from "../types/bootstrap.js";
import { UNTITLED, type Photo } from "./photo.js";

/**
 * Encodes a photo to the wire shape accepted by `photoSchema`.
 *
 * The "(untitled)" placeholder is a display default, not data, so it is
 * not written back.
 */
export function encodePhoto(photo: Photo): Record<string, unknown> {
  const encoded: Record<string, unknown> = { url: photo.url, size: photo.size };

  if (photo.title !== UNTITLED) {
    encoded.title = photo.title;
  }

  return encoded;
}

/**
 * Encodes a to-do list to its JSON-ready form. The todos storage port
 * stringifies the result.
 *
 * @example
 * JSON.stringify(encodeTodos([{ id: 1, title: "Read chapter 4", completed: false }]));
 * // '[{"id":1,"title":"Read chapter 4","completed":false}]'
 */
export function encodeTodos(todos: readonly Todo[]): Array<Record<string, unknown>> {
  return todos.map((todo) => ({
    id: todo.id,
    title: todo.title,
    completed: todo.completed,
  }));
}

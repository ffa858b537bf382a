/**
 * @fileoverview Typed localStorage ports
 *
 * WHAT IS A PORT HERE?
 * The app's state lives in a pure update loop; the browser's storage is
 * outside it. A port is the one doorway between them:
 *
 * - OUTGOING: `save(value)` encodes a typed value and writes it, then tells
 *   any subscribers what was sent.
 * - INCOMING: `load()` reads the stored text back through a decoder, so a
 *   value tampered with in devtools (or written by an older version) shows
 *   up as a decode error instead of a crash three screens later.
 *
 * The storage is injected. The browser passes `window.localStorage`; tests
 * pass `createMemoryStorage()`.
 */

import type { z } from "zod";
import { decodeString, type DecodeResult } from "../decoders/decode.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * The slice of the Web Storage API the ports use. `window.localStorage`
 * satisfies it as-is.
 */
export type KeyValueStorage = {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
};

export type StoragePort<T> = {
  save(value: T): void;
  /** null when nothing is stored under the key */
  load(): DecodeResult<T> | null;
  clear(): void;
  /** Listens to outgoing values. Returns the unsubscribe function. */
  subscribe(listener: (value: T) => void): () => void;
};

export type StoragePortOptions<S extends z.ZodTypeAny> = {
  key: string;
  schema: S;
  storage: KeyValueStorage;
  /** JSON-ready form of the value; defaults to the value itself */
  encode?: (value: z.output<S>) => unknown;
};

// ============================================================================
// CONSTANTS
// ============================================================================

export const STORAGE_KEYS = {
  todos: "study-archive.todos",
  filters: "study-archive.filters",
} as const;

// ============================================================================
// FACTORIES
// ============================================================================

/**
 * @example
 * const todosPort = createStoragePort({
 *   key: STORAGE_KEYS.todos,
 *   schema: todoListSchema,
 *   storage: window.localStorage,
 * });
 * todosPort.save(todos);
 * const saved = todosPort.load(); // DecodeResult<Todo[]> | null
 */
export function createStoragePort<S extends z.ZodTypeAny>(
  options: StoragePortOptions<S>
): StoragePort<z.output<S>> {
  const { key, schema, storage, encode = (value) => value } = options;
  const listeners = new Set<(value: z.output<S>) => void>();

  return {
    save(value) {
      storage.setItem(key, JSON.stringify(encode(value)));
      listeners.forEach((listener) => listener(value));
    },

    load() {
      const stored = storage.getItem(key);
      if (stored === null) return null;

      return decodeString(schema, stored);
    },

    clear() {
      storage.removeItem(key);
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}

/**
 * An in-memory KeyValueStorage.
 */
export function createMemoryStorage(
  initial: Record<string, string> = {}
): KeyValueStorage & { readonly size: number } {
  const map = new Map(Object.entries(initial));

  return {
    getItem: (key) => map.get(key) ?? null,
    setItem: (key, value) => {
      map.set(key, value);
    },
    removeItem: (key) => {
      map.delete(key);
    },
    get size() {
      return map.size;
    },
  };
}

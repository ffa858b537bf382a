/**
 * @fileoverview Bootstrap payload factories and validators
 *
 * The BFF builds payloads, the browser reads them back out of
 * `window.__BOOTSTRAP__`. Both sides go through the helpers here so the
 * shape can't drift.
 *
 * ERROR CODES:
 * - BOOTSTRAP_TIMEOUT: the upstream call took too long
 * - BOOTSTRAP_UPSTREAM: the upstream answered 4xx/5xx
 * - BOOTSTRAP_UNKNOWN: anything else (network failure, bad JSON, ...)
 *
 * VALIDATION:
 * A window global is just `unknown` at runtime. The payload is checked with
 * a zod schema deep enough to cover the photo, folder and todo data, since
 * those go straight into the store.
 */

import { z } from "zod";
import { photoSchema } from "../decoders/photo.js";
import { todoSchema } from "../decoders/todo.js";
import { folderJsonSchema, type FolderJson } from "../folders/folderTree.js";
import type { Photo } from "../decoders/photo.js";
import type {
  BootstrapErrorCode,
  BootstrapPayload,
  Todo,
} from "../types/bootstrap.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const BOOTSTRAP_ERROR_CODES = {
  TIMEOUT: "BOOTSTRAP_TIMEOUT",
  UPSTREAM: "BOOTSTRAP_UPSTREAM",
  UNKNOWN: "BOOTSTRAP_UNKNOWN",
} as const;

/**
 * Reader-facing messages. No status codes or stack traces.
 */
export const BOOTSTRAP_ERROR_MESSAGES = {
  TIMEOUT: "The server is taking too long to respond. Please try again.",
  UPSTREAM: "We could not load the page data. Please retry.",
  UNKNOWN: "An unexpected error occurred. Please refresh the page.",
} as const;

const DEFAULT_GREETING = "Welcome";

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Builds an error payload. Every option has a default, so
 * `makeErrorBootstrap("/gallery")` alone gives a status-0 UNKNOWN error.
 *
 * @example
 * makeErrorBootstrap("/todos", {
 *   status: 504,
 *   code: "BOOTSTRAP_TIMEOUT",
 *   message: BOOTSTRAP_ERROR_MESSAGES.TIMEOUT,
 * });
 */
export function makeErrorBootstrap(
  route: string,
  options: {
    status?: number;
    code?: BootstrapErrorCode;
    message?: string;
    greeting?: string;
  } = {}
): BootstrapPayload {
  const {
    status = 0,
    code = BOOTSTRAP_ERROR_CODES.UNKNOWN,
    message = BOOTSTRAP_ERROR_MESSAGES.UNKNOWN,
    greeting = DEFAULT_GREETING,
  } = options;

  return {
    route,
    greeting,
    page: {
      kind: "error",
      status,
      code,
      message,
    },
  };
}

export function makeHomeBootstrap(
  route: string,
  greeting: string
): BootstrapPayload {
  return {
    route,
    greeting,
    page: { kind: "home" },
  };
}

/**
 * @example
 * makeGalleryBootstrap("/gallery", "Welcome", [
 *   { url: "1.jpeg", size: 36, title: "Beachside" },
 * ]);
 */
export function makeGalleryBootstrap(
  route: string,
  greeting: string,
  photos: Photo[]
): BootstrapPayload {
  return {
    route,
    greeting,
    page: {
      kind: "gallery",
      photos,
    },
  };
}

export function makeFoldersBootstrap(
  route: string,
  greeting: string,
  folders: FolderJson
): BootstrapPayload {
  return {
    route,
    greeting,
    page: {
      kind: "folders",
      folders,
    },
  };
}

export function makeTodosBootstrap(
  route: string,
  greeting: string,
  todos: Todo[]
): BootstrapPayload {
  return {
    route,
    greeting,
    page: {
      kind: "todos",
      todos,
    },
  };
}

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

const basePayload = {
  route: z.string(),
  greeting: z.string(),
};

export const bootstrapPayloadSchema = z.union([
  z.object({
    ...basePayload,
    page: z.object({ kind: z.literal("home") }),
  }),
  z.object({
    ...basePayload,
    page: z.object({
      kind: z.literal("gallery"),
      photos: z.array(photoSchema),
    }),
  }),
  z.object({
    ...basePayload,
    page: z.object({
      kind: z.literal("folders"),
      folders: folderJsonSchema,
    }),
  }),
  z.object({
    ...basePayload,
    page: z.object({
      kind: z.literal("todos"),
      todos: z.array(todoSchema),
    }),
  }),
  z.object({
    ...basePayload,
    page: z.object({
      kind: z.literal("error"),
      status: z.number(),
      code: z.enum([
        BOOTSTRAP_ERROR_CODES.TIMEOUT,
        BOOTSTRAP_ERROR_CODES.UPSTREAM,
        BOOTSTRAP_ERROR_CODES.UNKNOWN,
      ]),
      message: z.string(),
    }),
  }),
]);

/**
 * Parses an untrusted value into a payload, or null when it doesn't fit.
 *
 * Returns the parsed value rather than narrowing the input: the schema fills
 * in photo titles, so the two can differ.
 *
 * @example
 * const payload = parseBootstrapPayload(window.__BOOTSTRAP__);
 * if (payload) {
 *   console.log(payload.route);
 * }
 */
export function parseBootstrapPayload(value: unknown): BootstrapPayload | null {
  const parsed = bootstrapPayloadSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * @fileoverview Types for the bootstrap payload the BFF hands the browser
 *
 * The server renders a page, then ships the data it rendered with as JSON so
 * the client can hydrate without a second round trip. Server and client
 * both import these types, so a field renamed on one side is a compile error
 * on the other.
 *
 * KEY CONCEPT: DISCRIMINATED UNIONS
 * `page.kind` tells the variants apart. A switch over it is checked for
 * exhaustiveness:
 * ```typescript
 * switch (payload.page.kind) {
 *   case "home":
 *     break;
 *   case "gallery":
 *     // payload.page.photos is available here
 *     break;
 *   case "folders":
 *     // payload.page.folders is available here
 *     break;
 *   case "todos":
 *     // payload.page.todos is available here
 *     break;
 *   case "error":
 *     // payload.page.status, code and message are available here
 *     break;
 * }
 * ```
 */

import type { Photo } from "../decoders/photo.js";
import type { FolderJson } from "../folders/folderTree.js";

// ============================================================================
// TODO TYPE
// ============================================================================

/**
 * A single to-do item, whether it came from the remote list
 * (JSONPlaceholder) or was typed into the local list.
 *
 * @example
 * const todo: Todo = { id: 1, title: "Re-read the decoders chapter", completed: false };
 */
export type Todo = {
  id: number;
  title: string;
  completed: boolean;
};

// ============================================================================
// PAGE TYPES
// ============================================================================

type HomePage = {
  kind: "home";
};

/**
 * The gallery ships its photo list with the HTML, so the first paint
 * already has thumbnails.
 */
type GalleryPage = {
  kind: "gallery";
  /** Photos in display order; the first one starts selected */
  photos: Photo[];
};

/**
 * Carries the tree as served, not decoded: the client decodes it the same
 * way it decodes /api/folders.
 */
type FoldersPage = {
  kind: "folders";
  folders: FolderJson;
};

type TodosPage = {
  kind: "todos";
  todos: Todo[];
};

/**
 * Rendered instead of crashing when a page's data could not be loaded.
 */
type ErrorPage = {
  kind: "error";
  /** HTTP status of the failed call, or 0 when there was no response */
  status: number;
  code: "BOOTSTRAP_TIMEOUT" | "BOOTSTRAP_UPSTREAM" | "BOOTSTRAP_UNKNOWN";
  /** Safe to show to the reader */
  message: string;
};

// ============================================================================
// BOOTSTRAP PAYLOAD
// ============================================================================

type PayloadFor<Page> = {
  /** The route this payload is for (e.g., "/", "/gallery") */
  route: string;
  /** Greeting shown in the header (e.g., "Welcome back, Ada") */
  greeting: string;
  page: Page;
};

/**
 * Initial data for one route.
 *
 * 1. The BFF builds it for the requested route
 * 2. The BFF renders React with it and injects it as `window.__BOOTSTRAP__`
 * 3. The browser reads it back and hydrates with the same data
 */
export type BootstrapPayload =
  | PayloadFor<HomePage>
  | PayloadFor<GalleryPage>
  | PayloadFor<FoldersPage>
  | PayloadFor<TodosPage>
  | PayloadFor<ErrorPage>;

export type BootstrapPageKind = BootstrapPayload["page"]["kind"];

export type BootstrapErrorCode = ErrorPage["code"];

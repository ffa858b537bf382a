/**
 * @fileoverview Reading the server's bootstrap payload
 *
 * The BFF renders each page and injects the data it rendered with as
 * `window.__BOOTSTRAP__`. The client must render the EXACT same markup to
 * hydrate, so it seeds its store from that payload before rendering.
 */

import { parseBootstrapPayload, type BootstrapPayload } from "@study-archive/shared";

declare global {
  interface Window {
    /** Bootstrap payload injected by SSR */
    __BOOTSTRAP__?: unknown;
  }
}

/**
 * Reads, validates and removes the injected payload.
 *
 * @returns null when nothing was injected (a client-only build) or the
 * payload doesn't match the schema
 *
 * @example
 * const bootstrap = readBootstrapFromWindow(window);
 * if (bootstrap) {
 *   applyBootstrapToStore(bootstrap, store.dispatch, api);
 * }
 */
export function readBootstrapFromWindow(win: Window): BootstrapPayload | null {
  const raw = win.__BOOTSTRAP__;
  if (raw === undefined) {
    return null;
  }

  // Read once
  delete win.__BOOTSTRAP__;

  const payload = parseBootstrapPayload(raw);
  if (!payload) {
    console.warn("[bootstrap] Invalid bootstrap payload shape in window");
  }

  return payload;
}

/**
 * @fileoverview Bootstrap payload generation for SSR
 *
 * THE FLOW:
 * 1. A reader requests /gallery
 * 2. The server loads the page's data (a fixture or the remote todos)
 * 3. The server wraps it in a bootstrap payload
 * 4. The server renders React with the payload and injects it into the HTML
 * 5. The browser hydrates with the same payload
 *
 * CACHING:
 * - Anonymous readers share one payload per route.
 * - Session readers get their own entry, keyed by session and route.
 * - Token-only readers are never cached: the greeting depends on a profile
 *   lookup made with their token.
 * Error payloads are never cached.
 */

import {
  BOOTSTRAP_ERROR_CODES,
  BOOTSTRAP_ERROR_MESSAGES,
  decodeValue,
  folderJsonSchema,
  makeErrorBootstrap,
  makeFoldersBootstrap,
  makeGalleryBootstrap,
  makeHomeBootstrap,
  makeTodosBootstrap,
  photoListSchema,
  type BootstrapPayload,
} from "@study-archive/shared";

import type { RequestContext } from "./requestContext.js";
import type { ServerConfig } from "./env.js";
import type { FixtureStore } from "./fixtures.js";
import { HttpError, type HttpClient } from "./httpClient.js";
import { TTLCache } from "./cache.js";
import { getProfile, getTodos } from "./external/index.js";

// ============================================================================
// TYPES
// ============================================================================

export type BootstrapDeps = {
  config: ServerConfig;
  fixtures: FixtureStore;
  /** Defaults to a 15 second TTLCache */
  cache?: TTLCache<BootstrapPayload>;
};

export type BootstrapService = {
  getBootstrapPayload(ctx: RequestContext, http: HttpClient): Promise<BootstrapPayload>;
};

/** A fixture that exists but doesn't decode */
class FixtureShapeError extends Error {
  constructor(fixture: string, detail: string) {
    super(`${fixture} fixture: ${detail}`);
    this.name = "FixtureShapeError";
  }
}

// ============================================================================
// CACHE KEYS
// ============================================================================

/**
 * @returns null when the payload must not be cached
 */
function cacheKeyFor(ctx: RequestContext): string | null {
  if (ctx.accessToken !== null) return null;
  if (ctx.userId !== null) return `user=${ctx.userId}:${ctx.route}`;
  return `route=${ctx.route}`;
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

/**
 * Maps a failure while loading page data to the error payload the page
 * renders instead.
 */
export function toErrorBootstrap(route: string, error: unknown): BootstrapPayload {
  if (error instanceof Error && error.name === "AbortError") {
    return makeErrorBootstrap(route, {
      status: 504,
      code: BOOTSTRAP_ERROR_CODES.TIMEOUT,
      message: BOOTSTRAP_ERROR_MESSAGES.TIMEOUT,
    });
  }

  if (error instanceof HttpError) {
    return makeErrorBootstrap(route, {
      status: error.status,
      code: BOOTSTRAP_ERROR_CODES.UPSTREAM,
      message: BOOTSTRAP_ERROR_MESSAGES.UPSTREAM,
    });
  }

  if (error instanceof FixtureShapeError) {
    return makeErrorBootstrap(route, {
      status: 502,
      code: BOOTSTRAP_ERROR_CODES.UPSTREAM,
      message: BOOTSTRAP_ERROR_MESSAGES.UPSTREAM,
    });
  }

  return makeErrorBootstrap(route, { status: 500 });
}

// ============================================================================
// SERVICE
// ============================================================================

export function createBootstrapService(deps: BootstrapDeps): BootstrapService {
  const { config, fixtures } = deps;
  const cache = deps.cache ?? new TTLCache<BootstrapPayload>({ ttlMs: 15_000 });

  async function generateGreeting(ctx: RequestContext, http: HttpClient): Promise<string> {
    if (!ctx.isAuthenticated) {
      return "Welcome";
    }

    if (ctx.accessToken === null || config.profileApiBaseUrl === null) {
      return "Welcome back";
    }

    try {
      const profile = await getProfile(http, {
        baseUrl: config.profileApiBaseUrl,
        accessToken: ctx.accessToken,
      });
      return `Welcome back, ${profile.name}`;
    } catch (error) {
      console.warn(
        `[bootstrap] Failed to fetch profile for greeting: ${error instanceof Error ? error.message : String(error)}`
      );
      return "Welcome back";
    }
  }

  async function buildPagePayload(
    ctx: RequestContext,
    http: HttpClient,
    greeting: string
  ): Promise<BootstrapPayload> {
    switch (ctx.route) {
      case "/gallery": {
        const photos = decodeValue(photoListSchema, await fixtures.readPhotos());
        if (!photos.ok) throw new FixtureShapeError("photos", photos.error);
        return makeGalleryBootstrap(ctx.route, greeting, photos.data);
      }

      case "/folders": {
        const folders = decodeValue(folderJsonSchema, await fixtures.readFolders());
        if (!folders.ok) throw new FixtureShapeError("folders", folders.error);
        return makeFoldersBootstrap(ctx.route, greeting, folders.data);
      }

      case "/todos": {
        const todos = await getTodos(http, { baseUrl: config.todosApiBaseUrl });
        return makeTodosBootstrap(ctx.route, greeting, todos);
      }

      default:
        return makeHomeBootstrap(ctx.route, greeting);
    }
  }

  /**
   * Never throws: a failure becomes an error payload so the page still
   * renders.
   */
  async function getBootstrapPayload(
    ctx: RequestContext,
    http: HttpClient
  ): Promise<BootstrapPayload> {
    const cacheKey = cacheKeyFor(ctx);

    if (cacheKey !== null) {
      const cached = cache.get(cacheKey);
      if (cached) {
        console.log(`[bootstrap] cache HIT ${cacheKey}`);
        return cached;
      }
      console.log(`[bootstrap] cache MISS ${cacheKey}`);
    }

    try {
      const greeting = await generateGreeting(ctx, http);
      const payload = await buildPagePayload(ctx, http, greeting);

      if (cacheKey !== null) {
        cache.set(cacheKey, payload);
      }

      return payload;
    } catch (error) {
      console.error(
        `[bootstrap] FAIL requestId=${ctx.requestId} userId=${ctx.userId} route=${ctx.route}`,
        error
      );
      return toErrorBootstrap(ctx.route, error);
    }
  }

  return { getBootstrapPayload };
}

/**
 * @fileoverview API route definitions for the BFF server
 *
 * ROUTE ORGANIZATION:
 * - /api/bootstrap - initial page data, as used for SSR
 * - /api/photos, /api/folders - the photo fixtures, passed through as JSON
 * - /api/todos - the remote sample to-do list
 * - /api/profile - OAuth userinfo proxy
 * - /api/hello, /health - smoke tests and health checks
 *
 * Every failure answers `{ code, message }` and logs the detail with the
 * request ID.
 */

import type { Express, Request, Response } from "express";
import type { ServerConfig } from "../server/env.js";
import type { FixtureStore } from "../server/fixtures.js";
import type { BootstrapService } from "../server/bootstrap.js";
import type { HttpClient } from "../server/httpClient.js";
import { buildRequestContext } from "../server/requestContext.js";
import { getProfile, getTodos } from "../server/external/index.js";
import { applyCachePolicy } from "./cachePolicy.js";

export type RouteDeps = {
  config: ServerConfig;
  fixtures: FixtureStore;
  bootstrap: BootstrapService;
  makeHttpClient: (requestId: string) => HttpClient;
};

type ErrorBody = { code: string; message: string };

function sendError(res: Response, status: number, body: ErrorBody): void {
  res.status(status).json(body);
}

/**
 * @example
 * const app = express();
 * registerRoutes(app, deps);
 */
export function registerRoutes(app: Express, deps: RouteDeps): void {
  registerBootstrapRoutes(app, deps);
  registerPhotoRoutes(app, deps);
  registerTodoRoutes(app, deps);
  registerProfileRoutes(app, deps);
  registerUtilityRoutes(app);
}

// ============================================================================
// BOOTSTRAP
// ============================================================================

function registerBootstrapRoutes(app: Express, deps: RouteDeps): void {
  /**
   * GET /api/bootstrap?path=/gallery
   * -> { route: "/gallery", greeting: "Welcome", page: { kind: "gallery", photos: [...] } }
   *
   * Always 200: a failed page load is an `error` page payload.
   */
  app.get("/api/bootstrap", async (req: Request, res: Response) => {
    const route = typeof req.query.path === "string" ? req.query.path : "/";
    const ctx = buildRequestContext(req, route);

    applyCachePolicy(req, res, "bootstrap");

    const payload = await deps.bootstrap.getBootstrapPayload(ctx, deps.makeHttpClient(ctx.requestId));
    res.status(200).json(payload);
  });
}

// ============================================================================
// PHOTOS AND FOLDERS
// ============================================================================

function registerPhotoRoutes(app: Express, deps: RouteDeps): void {
  const fixtureRoutes = [
    { path: "/api/photos", read: deps.fixtures.readPhotos, code: "PHOTOS_FAILED", what: "photos" },
    { path: "/api/folders", read: deps.fixtures.readFolders, code: "FOLDERS_FAILED", what: "folders" },
  ] as const;

  for (const route of fixtureRoutes) {
    app.get(route.path, async (req: Request, res: Response) => {
      const ctx = buildRequestContext(req, route.path);
      applyCachePolicy(req, res, "data");

      try {
        res.status(200).json(await route.read());
      } catch (error) {
        console.error(`[${route.what}] FAIL requestId=${ctx.requestId}`, error);
        sendError(res, 500, {
          code: route.code,
          message: `Failed to load ${route.what}. Please try again.`,
        });
      }
    });
  }
}

// ============================================================================
// TODOS
// ============================================================================

function registerTodoRoutes(app: Express, deps: RouteDeps): void {
  /**
   * GET /api/todos
   * -> [{ id: 1, title: "...", completed: false }, ...]
   */
  app.get("/api/todos", async (req: Request, res: Response) => {
    const ctx = buildRequestContext(req, "/todos");
    const http = deps.makeHttpClient(ctx.requestId);

    applyCachePolicy(req, res, "data");

    try {
      const todos = await getTodos(http, { baseUrl: deps.config.todosApiBaseUrl });
      res.status(200).json(todos);
    } catch (error) {
      console.error(`[todos] FAIL requestId=${ctx.requestId} userId=${ctx.userId}`, error);
      sendError(res, 500, {
        code: "TODOS_FAILED",
        message: "Failed to load todos. Please try again.",
      });
    }
  });
}

// ============================================================================
// PROFILE
// ============================================================================

function registerProfileRoutes(app: Express, deps: RouteDeps): void {
  /**
   * GET /api/profile with `Authorization: Bearer <token>`
   * -> { sub, name, email, picture? }
   */
  app.get("/api/profile", async (req: Request, res: Response) => {
    const ctx = buildRequestContext(req, "/profile");
    applyCachePolicy(req, res, "private");

    if (ctx.accessToken === null) {
      sendError(res, 401, {
        code: "PROFILE_UNAUTHORIZED",
        message: "Sign in to see your profile.",
      });
      return;
    }

    const baseUrl = deps.config.profileApiBaseUrl;
    if (baseUrl === null) {
      sendError(res, 503, {
        code: "PROFILE_NOT_CONFIGURED",
        message: "Profile lookup is not configured on this server.",
      });
      return;
    }

    try {
      const profile = await getProfile(deps.makeHttpClient(ctx.requestId), {
        baseUrl,
        accessToken: ctx.accessToken,
      });
      res.status(200).json(profile);
    } catch (error) {
      console.error(`[profile] FAIL requestId=${ctx.requestId}`, error);
      sendError(res, 502, {
        code: "PROFILE_FAILED",
        message: "Could not load your profile. Please try again.",
      });
    }
  });
}

// ============================================================================
// UTILITY
// ============================================================================

function registerUtilityRoutes(app: Express): void {
  app.get("/api/hello", (_req: Request, res: Response) => {
    res.status(200).json({ message: "Hello from the study archive BFF!" });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  });
}

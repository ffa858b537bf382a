/**
 * @fileoverview Server-Side Rendering (SSR) request handler
 *
 * WITH SSR:
 * 1. Server loads the page data (bootstrap payload)
 * 2. Server renders React to an HTML string
 * 3. Browser shows content immediately
 * 4. JavaScript hydrates it
 *
 * For hydration to work the client must render the EXACT same HTML as the
 * server, which is why the bootstrap payload travels with the page.
 */

import fs from "fs/promises";
import path from "path";
import type { NextFunction, Request, Response } from "express";
import type { HttpClient } from "../server/httpClient.js";
import type { BootstrapService } from "../server/bootstrap.js";
import type { ManifestReader } from "../server/manifest.js";
import { buildRequestContext } from "../server/requestContext.js";
import { renderHtml } from "../server/ssr/render.js";
import { applyCachePolicy } from "./cachePolicy.js";

export type SsrDeps = {
  staticDir: string;
  bootstrap: BootstrapService;
  manifest: ManifestReader;
  makeHttpClient: (requestId: string) => HttpClient;
};

/**
 * Renders every GET that isn't an API call or a file request.
 *
 * @example
 * app.get(/.*\/, createSsrHandler(deps));
 */
export function createSsrHandler(deps: SsrDeps) {
  const templatePath = path.join(deps.staticDir, "index.html");

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    // API routes have their own handlers; paths with an extension are files
    if (req.path.startsWith("/api") || path.extname(req.path)) {
      next();
      return;
    }

    const route = req.path;
    console.log(`[SSR] Rendering route: ${route}`);

    try {
      const ctx = buildRequestContext(req, route);
      const bootstrap = await deps.bootstrap.getBootstrapPayload(ctx, deps.makeHttpClient(ctx.requestId));
      const assets = await deps.manifest.resolveAssets();
      const template = await fs.readFile(templatePath, "utf-8");

      applyCachePolicy(req, res, "html");

      const html = renderHtml({ location: route, bootstrap, template, assets });

      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.status(200).send(html);
    } catch (error) {
      console.error(`[SSR] Error rendering ${route}:`, error);
      next(error);
    }
  };
}

/**
 * @fileoverview Express middleware for the BFF server
 *
 * ORDER MATTERS:
 * 1. requestLogger (sees every request)
 * 2. express.static with setStaticHeaders
 * 3. API routes, then the SSR handler
 * 4. notFoundHandler, then errorHandler last
 */

import path from "path";
import type { NextFunction, Request, Response } from "express";

// ============================================================================
// REQUEST LOGGING
// ============================================================================

/**
 * Logs `METHOD url status 1.23ms` once the response has been sent.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs.toFixed(2)}ms`);
    });

    next();
  };
}

// ============================================================================
// STATIC FILE HEADERS
// ============================================================================

/**
 * Cache headers for files under static/:
 * - HTML entry points: `no-store`
 * - hashed bundles under assets/: a year, immutable
 * - everything else (photos, favicon): an hour
 *
 * @example
 * app.use(express.static(dir, { setHeaders: setStaticHeaders }));
 */
export function setStaticHeaders(res: Response, filePath: string): void {
  const filename = path.basename(filePath);

  res.setHeader("Vary", "Accept-Encoding");

  if (filename === "index.html" || filename === "404.html") {
    res.setHeader("Cache-Control", "no-store");
    return;
  }

  if (filePath.includes(`${path.sep}assets${path.sep}`)) {
    res.setHeader("Cache-Control", "public, max-age=31536000, immutable");
    return;
  }

  res.setHeader("Cache-Control", "public, max-age=3600");
}

// ============================================================================
// FALLBACKS
// ============================================================================

/**
 * Unknown /api paths get JSON; everything else gets the static 404 page.
 */
export function notFoundHandler(staticDir: string) {
  return (req: Request, res: Response): void => {
    if (req.path.startsWith("/api/")) {
      res.status(404).json({ code: "NOT_FOUND", message: `No route for ${req.path}` });
      return;
    }

    res.status(404).sendFile(path.join(staticDir, "404.html"));
  };
}

/**
 * Last in the chain. Logs the error and answers with a generic body; the
 * details stay in the server log.
 */
export function errorHandler() {
  // Express recognises error middleware by its four parameters
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    console.error(`[error] ${req.method} ${req.originalUrl}`, error);

    if (res.headersSent) {
      res.end();
      return;
    }

    res.status(500).json({
      code: "INTERNAL_ERROR",
      message: "Something went wrong. Please try again.",
    });
  };
}

/**
 * @fileoverview Express app assembly
 *
 * Kept apart from index.ts so tests can build the whole app, with a fake
 * upstream client, and listen on an ephemeral port.
 */

import express, { type Express } from "express";
import path from "path";

import { getBffRootDir, type ServerConfig } from "./server/env.js";
import { createHttpClient, type HttpClient } from "./server/httpClient.js";
import { createFixtureStore } from "./server/fixtures.js";
import { createBootstrapService } from "./server/bootstrap.js";
import { createManifestReader } from "./server/manifest.js";
import { registerRoutes } from "./http/routes.js";
import { createSsrHandler } from "./http/ssrHandler.js";
import { errorHandler, notFoundHandler, requestLogger, setStaticHeaders } from "./http/middleware.js";

export type AppOptions = {
  config: ServerConfig;
  /** Defaults to apps/bff/static */
  staticDir?: string;
  /** Defaults to a real fetch-based client per request */
  makeHttpClient?: (requestId: string) => HttpClient;
};

export function createApp(opts: AppOptions): Express {
  const { config } = opts;
  const staticDir = opts.staticDir ?? path.join(getBffRootDir(), "static");
  const makeHttpClient =
    opts.makeHttpClient ?? ((requestId: string) => createHttpClient({ requestId }));

  const fixtures = createFixtureStore(config.fixturesDir);
  const bootstrap = createBootstrapService({ config, fixtures });
  const manifest = createManifestReader(staticDir);

  const app = express();
  app.disable("x-powered-by");

  app.use(requestLogger());
  app.use(express.static(staticDir, { index: false, setHeaders: setStaticHeaders }));

  registerRoutes(app, { config, fixtures, bootstrap, makeHttpClient });

  app.get(/.*/, createSsrHandler({ staticDir, bootstrap, manifest, makeHttpClient }));

  app.use(notFoundHandler(staticDir));
  app.use(errorHandler());

  return app;
}

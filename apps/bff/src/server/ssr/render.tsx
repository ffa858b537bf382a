import React from "react";
import { renderToString } from "react-dom/server";
import { Provider } from "react-redux";
import { StaticRouter } from "react-router";
import type { BootstrapPayload } from "@study-archive/shared";
import { api, App, applyBootstrapToStore, makeStore } from "@study-archive/ui";
import type { ResolvedAssets } from "../manifest.js";

/**
 * JSON that is safe inside an inline <script>: `<` can't open a closing
 * tag, and U+2028/U+2029 can't end the line.
 */
export function escapeJsonForHtml(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export type RenderOptions = {
  /** Path rendered by the router, e.g. "/gallery" */
  location: string;
  bootstrap: BootstrapPayload;
  /** static/index.html, which must contain `<div id="root"></div>` */
  template: string;
  assets: ResolvedAssets;
};

/**
 * Renders the app for one request and fills in the page template.
 *
 * The store is built from the same bootstrap payload the browser will read
 * back from `window.__BOOTSTRAP__`, so the hydrated markup matches.
 */
export function renderHtml(opts: RenderOptions): string {
  const { store } = makeStore({ apiBaseUrl: "/api", api });
  applyBootstrapToStore(opts.bootstrap, store.dispatch, api);

  const appHtml = renderToString(
    <Provider store={store}>
      <StaticRouter location={opts.location}>
        <App />
      </StaticRouter>
    </Provider>,
  );

  const bootstrapScript = `<script>window.__BOOTSTRAP__=${escapeJsonForHtml(opts.bootstrap)};</script>`;
  const styleTag = opts.assets.mainStyle
    ? `<link rel="stylesheet" href="${opts.assets.mainStyle}">`
    : "";
  const appScript = `<script defer src="${opts.assets.mainScript}"></script>`;

  const withRoot = opts.template.replace(
    /<div id="root"><\/div>/,
    `<div id="root">${appHtml}</div>`,
  );

  return withRoot.includes("</head>")
    ? withRoot.replace("</head>", `${styleTag}${bootstrapScript}${appScript}</head>`)
    : withRoot.replace("</body>", `${styleTag}${bootstrapScript}${appScript}</body>`);
}

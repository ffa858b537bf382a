/**
 * @fileoverview Client entry point
 *
 * TWO MODES OF OPERATION:
 *
 * 1. SSR HYDRATION (served by the BFF):
 *    - The server rendered HTML and injected __BOOTSTRAP__
 *    - The store is seeded from it, so the first render matches the markup
 *    - Query hooks find their data cached, nothing is fetched
 *
 * 2. CSR (a client-only dev server):
 *    - No markup and no payload
 *    - The store starts empty and the pages' query hooks fetch from /api
 *
 * Saved todos and gallery settings are restored only after the first
 * commit; restoring them earlier would make hydration see different markup.
 */
import React from "react";
import { createRoot, hydrateRoot } from "react-dom/client";
import { BrowserRouter } from "react-router-dom";
import { Provider } from "react-redux";

import { api, App, applyBootstrapToStore, makeStore, type AppStore } from "@study-archive/ui";
import { readBootstrapFromWindow } from "./bootstrap.js";
import { createAppPorts, persistOnChange, restoreSavedState, type AppPorts } from "./persistence.js";

function RestoreSavedState({ store, ports }: { store: AppStore["store"]; ports: AppPorts }) {
  React.useEffect(() => {
    restoreSavedState(store.dispatch, ports);
    return persistOnChange(store, ports);
  }, [store, ports]);

  return null;
}

function start(): void {
  const rootEl = document.getElementById("root");
  if (!rootEl) throw new Error("Missing #root element");

  // Same instance the page hooks come from
  const { store } = makeStore({ apiBaseUrl: "/api", api });

  const bootstrap = readBootstrapFromWindow(window);
  if (bootstrap) {
    applyBootstrapToStore(bootstrap, store.dispatch, api);
  }

  const ports = createAppPorts(window.localStorage);

  const app = (
    <React.StrictMode>
      <Provider store={store}>
        <BrowserRouter>
          <App />
        </BrowserRouter>
        <RestoreSavedState store={store} ports={ports} />
      </Provider>
    </React.StrictMode>
  );

  if (rootEl.childNodes.length > 0) {
    hydrateRoot(rootEl, app);
  } else {
    createRoot(rootEl).render(app);
  }
}

start();

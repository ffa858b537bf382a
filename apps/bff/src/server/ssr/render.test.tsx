import { describe, expect, it } from "vitest";
import { makeHomeBootstrap, makeTodosBootstrap } from "@study-archive/shared";
import { escapeJsonForHtml, renderHtml } from "./render.js";

const template = '<html><head></head><body><div id="root"></div></body></html>';

describe("escapeJsonForHtml", () => {
  it("keeps a closing script tag from ending the inline script", () => {
    expect(escapeJsonForHtml({ title: "</script>" })).toBe('{"title":"\\u003c/script>"}');
  });

  it("escapes line and paragraph separators", () => {
    expect(escapeJsonForHtml("a\u2028b\u2029c")).toBe('"a\\u2028b\\u2029c"');
  });
});

describe("renderHtml", () => {
  it("injects the markup, the payload and the assets into the head", () => {
    const bootstrap = makeTodosBootstrap("/todos", "Welcome", [
      { id: 1, title: "Re-read chapter 6", completed: false },
    ]);

    const html = renderHtml({
      location: "/todos",
      bootstrap,
      template,
      assets: { mainScript: "/assets/app.1.js", mainStyle: "/assets/app.1.css" },
    });

    expect(html).toContain("Re-read chapter 6");
    expect(html).toContain("1 item left");
    expect(html).toContain(
      `<link rel="stylesheet" href="/assets/app.1.css"><script>window.__BOOTSTRAP__=${escapeJsonForHtml(bootstrap)};</script><script defer src="/assets/app.1.js"></script></head>`
    );
  });

  it("renders the not-found page for an unknown location", () => {
    const html = renderHtml({
      location: "/nowhere",
      bootstrap: makeHomeBootstrap("/nowhere", "Welcome"),
      template,
      assets: { mainScript: "/assets/app.1.js", mainStyle: null },
    });

    expect(html).toContain("<h2>No exercise here</h2>");
    expect(html).toContain("<code>/nowhere</code>");
  });
});

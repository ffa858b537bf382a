import type { Request, Response } from "express";
import { isAuthenticated } from "./auth.js";

export type CacheMode = "html" | "bootstrap" | "data" | "private";

const PRIVATE = "private, no-store";

// Shared-cache lifetimes for anonymous responses
const PUBLIC_POLICIES: Record<Exclude<CacheMode, "private">, string> = {
  html: "public, max-age=0, s-maxage=60, stale-while-revalidate=300",
  bootstrap: "public, max-age=0, s-maxage=30, stale-while-revalidate=120",
  data: "public, max-age=0, s-maxage=120, stale-while-revalidate=600",
};

/**
 * Sets Cache-Control for a response. Signed-in readers and the "private"
 * mode always get `private, no-store`.
 */
export function applyCachePolicy(req: Request, res: Response, mode: CacheMode): void {
  // Don't vary on Cookie/Authorization: signed-in responses are never shared anyway
  res.setHeader("Vary", "Accept-Encoding");

  if (mode === "private" || isAuthenticated(req)) {
    res.setHeader("Cache-Control", PRIVATE);
    return;
  }

  res.setHeader("Cache-Control", PUBLIC_POLICIES[mode]);
}

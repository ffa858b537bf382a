import type express from "express";
import crypto from "crypto";
import { readBearerToken, readSessionId } from "../http/auth.js";

export type RequestContext = {
  requestId: string;
  /** Session ID for cookie sessions; null for anonymous or token-only callers */
  userId: string | null;
  accessToken: string | null;
  isAuthenticated: boolean;
  route: string;
};

export function buildRequestContext(
  req: express.Request,
  routeOverride?: string,
): RequestContext {
  const accessToken = readBearerToken(req);
  const userId = readSessionId(req);

  return {
    requestId: crypto.randomUUID(),
    userId,
    accessToken,
    route: routeOverride ?? req.path,
    isAuthenticated: userId !== null || accessToken !== null,
  };
}

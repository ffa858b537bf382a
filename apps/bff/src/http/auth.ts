import type { Request } from "express";

/**
 * The token from `Authorization: Bearer <token>`, or null when the header is
 * missing, uses another scheme, or has an empty token.
 */
export function readBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

export function readSessionId(req: Request): string | null {
  const cookie = req.headers.cookie ?? "";
  const match = /(?:^|;\s*)session=([^;]+)/.exec(cookie);
  return match?.[1] ?? null;
}

/**
 * A session cookie or a bearer token counts as signed in. Neither is
 * verified here; the profile provider does that.
 */
export function isAuthenticated(req: Request): boolean {
  return readSessionId(req) !== null || readBearerToken(req) !== null;
}

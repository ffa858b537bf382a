/**
 * @fileoverview OAuth profile lookup
 *
 * The browser already holds an access token; the BFF only forwards it to
 * the provider's userinfo endpoint and narrows the answer to the fields
 * the app shows. No login, refresh or token storage happens here.
 */

import { z } from "zod";
import { decodeValue } from "@study-archive/shared";
import type { HttpClient } from "../httpClient.js";

export const profileSchema = z.object({
  sub: z.string().min(1),
  name: z.string(),
  // Providers omit email when the scope wasn't granted
  email: z.string().nullable().default(null),
  picture: z.string().url().optional(),
});

export type Profile = z.infer<typeof profileSchema>;

/**
 * @throws HttpError when the provider rejects the call
 * @throws Error when the body doesn't decode
 *
 * @example
 * const profile = await getProfile(http, {
 *   baseUrl: "https://auth.example.com",
 *   accessToken: "test-token",
 * });
 */
export async function getProfile(
  http: HttpClient,
  opts: { baseUrl: string; accessToken: string }
): Promise<Profile> {
  const raw = await http.getJson(`${opts.baseUrl}/userinfo`, {
    timeoutMs: 3000,
    retries: 0,
    headers: { Authorization: `Bearer ${opts.accessToken}` },
  });

  const decoded = decodeValue(profileSchema, raw);
  if (!decoded.ok) {
    throw new Error(`Unexpected profile response: ${decoded.error}`);
  }

  return decoded.data;
}

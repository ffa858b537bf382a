/**
 * @fileoverview Server configuration from environment variables
 *
 * Everything the BFF reads from `process.env` goes through one zod schema,
 * so a typo'd port or a malformed URL stops the server at startup instead
 * of surfacing on the first request.
 */

import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { formatDecodeError } from "@study-archive/shared";

// apps/bff, from either src/server or dist/server
const bffRootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const DEFAULT_TODOS_API_BASE_URL = "https://jsonplaceholder.typicode.com";

// An empty variable counts as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  TODOS_API_BASE_URL: optionalString.pipe(z.string().url().default(DEFAULT_TODOS_API_BASE_URL)),
  PROFILE_API_BASE_URL: optionalString.pipe(z.string().url().optional()),
  FIXTURES_DIR: optionalString,
});

export type ServerConfig = {
  port: number;
  todosApiBaseUrl: string;
  /** Null disables /api/profile */
  profileApiBaseUrl: string | null;
  /** Holds photos.json and folders.json */
  fixturesDir: string;
};

/**
 * @throws Error naming every invalid variable
 *
 * @example
 * loadConfig({ PORT: "8080" });
 * // { port: 8080, todosApiBaseUrl: "https://jsonplaceholder.typicode.com", ... }
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`Invalid environment: ${formatDecodeError(parsed.error)}`);
  }

  const { PORT, TODOS_API_BASE_URL, PROFILE_API_BASE_URL, FIXTURES_DIR } = parsed.data;

  return {
    port: PORT,
    todosApiBaseUrl: TODOS_API_BASE_URL.replace(/\/+$/, ""),
    profileApiBaseUrl: PROFILE_API_BASE_URL ? PROFILE_API_BASE_URL.replace(/\/+$/, "") : null,
    fixturesDir: FIXTURES_DIR ? path.resolve(FIXTURES_DIR) : path.join(bffRootDir, "data"),
  };
}

export function getBffRootDir(): string {
  return bffRootDir;
}

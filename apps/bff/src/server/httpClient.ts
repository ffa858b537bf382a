/**
 * @fileoverview Server-side HTTP client with request tracing
 *
 * Timeouts and the retry rule come from @study-archive/shared; this adds
 * what only the server needs:
 *
 * 1. REQUEST TRACING - every upstream call carries the incoming request's
 *    ID in `X-Request-ID` and in the log line.
 *
 * 2. THROWS, DOESN'T RETURN - route handlers wrap a whole sequence of calls
 *    in one try/catch, so failures are `HttpError`s rather than result
 *    values. The status survives for the route to map.
 *
 * 3. UNKNOWN BODIES - `getJson` returns `unknown`; callers decode with a
 *    schema before trusting anything.
 */

import { createTimeoutController, isRetryableError, sleep } from "@study-archive/shared";

// ============================================================================
// TYPES
// ============================================================================

export type GetJsonOptions = {
  timeoutMs?: number;
  retries?: number;
  /** Merged over the default Accept and X-Request-ID headers */
  headers?: Record<string, string>;
};

export type HttpClient = {
  /**
   * @throws HttpError for a non-2xx response
   * @throws the fetch error once retries run out on a network failure
   */
  getJson(url: string, opts?: GetJsonOptions): Promise<unknown>;
};

/**
 * An upstream answered, but not with 2xx.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status} ${statusText}`.trim());
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000;
}

function logRequest(
  requestId: string,
  method: string,
  url: string,
  durationMs: number,
  status?: number
): void {
  const statusStr = status ? ` ${status}` : "";
  console.log(`[${requestId}] ${method} ${url}${statusStr} (${durationMs.toFixed(2)}ms)`);
}

// ============================================================================
// CLIENT FACTORY
// ============================================================================

/**
 * One client per incoming request, bound to its request ID.
 *
 * @example
 * const http = createHttpClient({ requestId: ctx.requestId });
 * const raw = await http.getJson(`${baseUrl}/todos?_limit=5`);
 */
export function createHttpClient(config: { requestId: string }): HttpClient {
  const { requestId } = config;

  async function getJson(url: string, opts: GetJsonOptions = {}): Promise<unknown> {
    const timeoutMs = opts.timeoutMs ?? 5000;
    const maxRetries = opts.retries ?? 1;

    for (let attempt = 0; ; attempt++) {
      const { controller, cleanup } = createTimeoutController(timeoutMs);
      const start = process.hrtime.bigint();

      try {
        const response = await fetch(url, {
          method: "GET",
          signal: controller.signal,
          headers: {
            Accept: "application/json",
            "X-Request-ID": requestId,
            ...opts.headers,
          },
        });

        logRequest(requestId, "GET", url, elapsedMs(start), response.status);

        if (!response.ok) {
          throw new HttpError(response.status, response.statusText, url);
        }

        const body: unknown = await response.json();
        return body;
      } catch (error) {
        console.error(
          `[${requestId}] GET ${url} FAILED (${elapsedMs(start).toFixed(2)}ms):`,
          error instanceof Error ? error.message : error
        );

        // HTTP errors are answers, not outages: only network-level failures retry
        if (!isRetryableError(error) || attempt >= maxRetries) {
          throw error;
        }

        const backoffMs = 100 * (attempt + 1);
        console.log(`[${requestId}] Retrying in ${backoffMs}ms...`);
        await sleep(backoffMs);
      } finally {
        cleanup();
      }
    }
  }

  return { getJson };
}

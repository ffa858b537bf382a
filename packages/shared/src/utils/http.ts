/**
 * @fileoverview Retry and timeout building blocks for upstream calls
 *
 * The BFF's HttpClient owns the request loop; these are the pieces of it
 * that don't depend on the server.
 *
 * 1. TIMEOUTS - An AbortController cancels the request after `timeoutMs`.
 *    The abort surfaces as an AbortError, which counts as retryable.
 *
 * 2. RETRIES - Only network-level failures are retried (AbortError and
 *    TypeError, which is what fetch throws when it cannot connect). An HTTP
 *    404 or 500 is a real answer from the server.
 */

/**
 * True for failures worth another attempt: aborts (our own timeout) and
 * TypeErrors (DNS, connection refused).
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  return error.name === "AbortError" || error instanceof TypeError;
}

/**
 * An AbortController that aborts itself after `timeoutMs`.
 *
 * Call `cleanup()` once the request settles, or the timer keeps the
 * event loop alive.
 *
 * @example
 * const { controller, cleanup } = createTimeoutController(1500);
 * try {
 *   await fetch(url, { signal: controller.signal });
 * } finally {
 *   cleanup();
 * }
 */
export function createTimeoutController(timeoutMs: number): {
  controller: AbortController;
  cleanup: () => void;
} {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  return {
    controller,
    cleanup: () => clearTimeout(timeoutId),
  };
}

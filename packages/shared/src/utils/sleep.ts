/**
 * Resolves after `ms` milliseconds.
 *
 * Used for the backoff between fetch retries.
 *
 * @example
 * await sleep(100 * attempt); // 100ms, 200ms, ...
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

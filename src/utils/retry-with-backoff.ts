/**
 * Retry utility with exponential backoff for transient network failures.
 */

const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "UND_ERR_CONNECT_TIMEOUT"]);

/**
 * Whether an error looks transient: a socket-level error code, an undici
 * "fetch failed", a timeout, or an HTTP 5xx in the message.
 */
export function isTransientError(err: unknown): boolean {
  const code = typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : "";
  const message = err instanceof Error ? err.message : String(err);
  return RETRYABLE_CODES.has(code)
    || message.includes("fetch failed")
    || message.includes("timed out")
    || /\b5\d{2}\b/.test(message);
}

/**
 * Retry an async function with exponential backoff.
 *
 * @param fn - Async function to retry.
 * @param maxRetries - Retry attempts after the first (0 = run once).
 * @param initialDelayMs - First delay; doubles each attempt, capped at 30s.
 * @param onRetry - Called before each wait, for debug logging.
 * @throws The last error once attempts are exhausted or the error is not transient.
 */
export async function retryAsync<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  initialDelayMs = 1000,
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isTransientError(err) || attempt >= maxRetries) {
        throw err;
      }
      const delay = Math.min(initialDelayMs * (2 ** attempt), 30_000);
      onRetry?.(attempt + 1, delay, err);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
}

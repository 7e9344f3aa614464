// ---------------------------------------------------------------------------
// Bounded retry with a fixed delay between attempts.
// ---------------------------------------------------------------------------

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Sleep before every retry. */
  delayMs: number;
  /**
   * Decides whether a given error is worth another attempt.  Errors for
   * which it returns `false` are thrown immediately.
   */
  shouldRetry: (error: unknown) => boolean;
  /** Called before each sleep with the 1-based number of the failed attempt. */
  onRetry?: (error: unknown, attempt: number) => void;
}

/** Returns a promise that resolves after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn`, retrying up to `maxRetries` times while `shouldRetry`
 * accepts the error.  When the attempts run out the last error is thrown.
 *
 * `fn` receives the 0-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxRetries, delayMs, shouldRetry, onRetry } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      onRetry?.(error, attempt + 1);
      await sleep(delayMs);
    }
  }

  // Unreachable; the loop either returns or throws.
  throw lastError;
}

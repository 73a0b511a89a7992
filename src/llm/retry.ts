import * as log from '../utils/logger.js';

// ── Rate-limit retry ─────────────────────────────────────────

export interface RetryPolicy {
  attempts: number;
  /** Wait before the first retry; doubles on each further one. */
  baseDelayMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 5_000 };

/** Thrown by a provider call that may be retried after `retryAfterMs`. */
export class RateLimitedError extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs?: number,
  ) {
    super(`${provider} API: rate limited`);
    this.name = 'RateLimitedError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call `fn`, retrying only when `isRateLimit` accepts the error. Any
 * other error, or a rate limit on the last attempt, propagates.
 */
export async function withRateLimitRetry<T>(
  provider: string,
  fn: () => Promise<T>,
  isRateLimit: (err: unknown) => boolean,
  policy: RetryPolicy = DEFAULT_RETRY,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimit(err) || attempt >= policy.attempts) throw err;

      const hinted = err instanceof RateLimitedError ? err.retryAfterMs : undefined;
      const waitMs = hinted ?? policy.baseDelayMs * 2 ** (attempt - 1);
      log.warn(
        `[${provider}] Rate limited, retry ${String(attempt)}/${String(policy.attempts - 1)} in ${String(Math.round(waitMs / 1000))}s`,
      );
      await wait(waitMs);
    }
  }
}

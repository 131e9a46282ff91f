export interface BackoffConfig {
  baseMs: number;
  maxMs: number;
  factor: number;
  jitter: number; // 0-1, e.g., 0.25 = ±25%
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseMs: 250,
  maxMs: 8_000,
  factor: 2,
  jitter: 0.25,
};

/**
 * Exponential backoff with jitter.
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF,
): number {
  const delay = config.baseMs * config.factor ** attempt;
  const capped = Math.min(delay, config.maxMs);
  const jitterRange = capped * config.jitter;
  const jitterOffset = jitterRange * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitterOffset));
}

/**
 * Sleep that wakes early (rejecting with the signal's reason) on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

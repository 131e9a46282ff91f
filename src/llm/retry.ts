import { type BackoffConfig, DEFAULT_BACKOFF, calculateBackoff, sleep } from "../engine/backoff.js";
import { LlmError, type LlmClient, type LlmRequest, type LlmResponse } from "./types.js";

export interface RetryOpts {
  retries: number;
  backoff?: BackoffConfig;
  signal?: AbortSignal;
  onRetry?: (err: unknown, retry_count: number) => void;
}

/**
 * Call the LLM, retrying retryable failures with exponential backoff.
 * Non-LlmError throws (bugs, aborts) are never retried. The last error is
 * rethrown once retries are exhausted.
 */
export async function completeWithRetry(
  llm: LlmClient,
  request: LlmRequest,
  opts: RetryOpts,
): Promise<LlmResponse> {
  let retry_count = 0;

  while (true) {
    try {
      return await llm.complete(request, opts.signal);
    } catch (err) {
      if (opts.signal?.aborted) throw opts.signal.reason;
      const retryable = err instanceof LlmError && err.retryable;
      if (!retryable || retry_count >= opts.retries) throw err;

      opts.onRetry?.(err, retry_count + 1);
      retry_count++;
      await sleep(calculateBackoff(retry_count - 1, opts.backoff ?? DEFAULT_BACKOFF), opts.signal);
    }
  }
}

// ============================================================================
// RETRY MANAGER — bounded retry with backoff for one fallible async operation
// ============================================================================

import { createTiming, type CancellationToken, type Timing } from "../browser-session";

export interface RetryOptions<T> {
  /** Total attempts, including the first (values below 1 run once) */
  maxRetries: number;
  delayMs: number;
  /** Delay multiplier applied after each wait (1 = fixed delay) */
  backoff?: number;
  /** Treat a resolved value as a failure worth retrying */
  retryIf?: (result: T) => boolean;
  token?: CancellationToken;
  timing?: Timing;
  /** Prefix for log lines */
  label?: string;
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run `operation` until it resolves to an acceptable value, the attempts
 * run out, or the token is cancelled. Returns the last value; if the last
 * attempt threw, rethrows that error.
 */
export async function retryAsync<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxRetries);
  const backoff = options.backoff ?? 1;
  const timing = options.timing ?? createTiming(options.token);
  const label = options.label ?? "retryAsync";

  let delayMs = options.delayMs;
  let last: Outcome<T> | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1 && options.token?.isCancelled) {
      console.log(`[${label}] Stop requested, giving up after ${attempt - 1} attempt(s)`);
      break;
    }

    try {
      const value = await operation(attempt);
      last = { ok: true, value };
      if (!options.retryIf?.(value)) return value;
      console.log(`[${label}] Attempt ${attempt}/${maxAttempts} returned a retryable result`);
    } catch (error) {
      last = { ok: false, error };
      console.log(`[${label}] Attempt ${attempt}/${maxAttempts} failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (attempt < maxAttempts) {
      const completed = await timing.sleep(delayMs);
      if (!completed) {
        console.log(`[${label}] Stop requested during retry delay`);
        break;
      }
      delayMs *= backoff;
    }
  }

  if (last === null) {
    // Unreachable: the first attempt always runs.
    throw new Error(`[${label}] No attempt was made`);
  }
  if (!last.ok) throw last.error;
  return last.value;
}

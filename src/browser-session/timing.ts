// ============================================================================
// TIMING — sliced sleeps and bounded polls
// ============================================================================

import type { CancellationToken } from "./cancellation";

/** Longest single suspension inside a sleep; a stop is observed within one slice. */
export const SLEEP_SLICE_MS = 100;

/**
 * Every explicit delay in the pipeline goes through this interface so tests
 * can run the state machines without real waiting.
 */
export interface Timing {
  /** Resolves `true` when the full delay elapsed, `false` if a stop cut it short. */
  sleep(ms: number): Promise<boolean>;
  /** Uniform in [0, 1) */
  random(): number;
  now(): Date;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Real timers, sliced so that `token` is checked every `SLEEP_SLICE_MS`. */
export function createTiming(token?: CancellationToken): Timing {
  return {
    async sleep(ms: number): Promise<boolean> {
      let remaining = ms;
      while (remaining > 0) {
        if (token?.isCancelled) return false;
        const slice = Math.min(SLEEP_SLICE_MS, remaining);
        await delay(slice);
        remaining -= slice;
      }
      return !token?.isCancelled;
    },
    random: () => Math.random(),
    now: () => new Date(),
  };
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
}

/**
 * Bounded poll: check `predicate` every `intervalMs` up to `timeoutMs`.
 * The number of checks is fixed up front (timeout / interval, plus a final
 * check), so the bound holds regardless of how long each sleep really takes.
 */
export async function pollUntil(
  predicate: () => boolean,
  options: PollOptions,
  timing: Timing
): Promise<boolean> {
  const iterations = Math.max(0, Math.ceil(options.timeoutMs / options.intervalMs));

  for (let i = 0; i < iterations; i++) {
    if (predicate()) return true;
    const completed = await timing.sleep(options.intervalMs);
    if (!completed) return predicate();
  }
  return predicate();
}

/** Uniform random delay in [minMs, maxMs]. */
export function randomDelay(minMs: number, maxMs: number, timing: Timing): number {
  return Math.round(minMs + (maxMs - minMs) * timing.random());
}

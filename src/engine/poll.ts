/**
 * Long-running operation polling with exponential backoff.
 *
 * The first check happens right after `apply` returns. Later checks wait
 * `initialDelayMs`, then `initialDelayMs * multiplier`, and so on up to
 * `maxDelayMs`. Waits are timers, so other nodes keep running meanwhile.
 */

import type { PollConfig } from "../config.js";
import type { OutputBindings } from "../graph/types.js";
import type { OperationHandle, PollResult, ProviderFailure } from "../provider/types.js";

export type PollOutcome =
  | { status: "succeeded"; outputs: OutputBindings; attempts: number }
  | { status: "failed"; error: ProviderFailure; attempts: number }
  | { status: "timeout"; attempts: number }
  | { status: "cancelled"; attempts: number };

/** Delay before check number `attempt + 1` (attempt is 1-based). */
export function backoffDelay(attempt: number, config: PollConfig): number {
  const raw = config.initialDelayMs * config.multiplier ** (attempt - 1);
  return Math.min(raw, config.maxDelayMs);
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Poll an operation until it succeeds, fails, runs out of time or is cancelled.
 * Errors thrown by `check` propagate to the caller.
 */
export async function pollUntilTerminal(
  check: (handle: OperationHandle) => Promise<PollResult>,
  handle: OperationHandle,
  config: PollConfig,
  options: {
    signal?: AbortSignal;
    onPending?: (attempt: number, nextDelayMs: number) => void;
  } = {},
): Promise<PollOutcome> {
  const deadline = config.timeoutMs > 0 ? Date.now() + config.timeoutMs : Number.POSITIVE_INFINITY;
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await check(handle);

    if (result.status === "succeeded") return { status: "succeeded", outputs: result.outputs, attempts };
    if (result.status === "failed") return { status: "failed", error: result.error, attempts };

    if (options.signal?.aborted) return { status: "cancelled", attempts };

    const remaining = deadline - Date.now();
    if (remaining <= 0) return { status: "timeout", attempts };

    const delay = Math.min(backoffDelay(attempts, config), remaining);
    options.onPending?.(attempts, delay);
    await sleep(delay, options.signal);

    if (options.signal?.aborted) return { status: "cancelled", attempts };
  }
}

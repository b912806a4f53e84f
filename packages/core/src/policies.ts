/**
 * Policies for rate limiting, waiting and cancellation
 */

import { CancelledError, errorMessage } from "./errors";

export class RateLimiter {
  private lastCallTime = 0;
  private minIntervalMs: number;

  constructor(rps: number) {
    this.minIntervalMs = rps > 0 ? 1000 / rps : 0;
  }

  async wait(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const timeSinceLastCall = now - this.lastCallTime;
    const waitTime = Math.max(0, this.minIntervalMs - timeSinceLastCall);

    if (waitTime > 0) {
      await delay(waitTime, signal);
    }

    this.lastCallTime = Date.now();
  }
}

/**
 * Time source used by polling loops; tests substitute a fake.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => delay(ms, signal),
};

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationError(signal));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancellationError(signal));
    };

    timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancellationError(signal);
  }
}

function cancellationError(signal?: AbortSignal): CancelledError {
  const reason: unknown = signal?.reason;
  return new CancelledError(`Cancelled: ${reason === undefined ? "aborted" : errorMessage(reason)}`, {
    cause: reason,
  });
}

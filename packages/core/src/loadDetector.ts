/**
 * Load-completion detection for dashboards that render asynchronously
 *
 * There is no reliable "done" event from the BI application, so the page is
 * polled for loading signals. A page is ready once the signals have read zero
 * for a full settle window; a zero reading alone (for instance at t=0, before
 * anything rendered) only makes it a stable candidate. When the ceiling is
 * reached first the outcome is timedOut, and callers capture anyway: some
 * widgets poll forever.
 */

import { activeSignalCount, type LoadSignals } from "@report-describer/extractors";
import { errorMessage } from "./errors";
import { systemClock, throwIfCancelled, type Clock } from "./policies";
import type { LoadState } from "./types";

export type SignalSampler = () => Promise<LoadSignals>;

export type LoadDetectorOptions = {
  maxWaitMs: number;
  settleMs: number;
  pollIntervalMs: number;
  clock?: Clock;
};

export type LoadTransition = {
  state: LoadState;
  /** Milliseconds since the wait started */
  atMs: number;
};

export type LoadOutcome = {
  state: Extract<LoadState, "ready" | "timedOut">;
  elapsedMs: number;
  samples: number;
  transitions: LoadTransition[];
  /** Set when the most recent sample could not be read */
  lastSampleError?: string;
};

export class LoadCompletionDetector {
  private options: Required<LoadDetectorOptions>;

  constructor(options: LoadDetectorOptions) {
    this.options = { ...options, clock: options.clock ?? systemClock };
  }

  /**
   * Poll until the page is ready or the ceiling is reached. Safe to call
   * repeatedly; every call keeps its own state.
   */
  async waitUntilReady(sample: SignalSampler, signal?: AbortSignal): Promise<LoadOutcome> {
    const { clock, maxWaitMs, settleMs, pollIntervalMs } = this.options;
    const start = clock.now();
    const transitions: LoadTransition[] = [{ state: "loading", atMs: 0 }];
    let state: LoadState = "loading";
    let quietSince: number | null = null;
    let samples = 0;
    let lastSampleError: string | undefined;

    const moveTo = (next: LoadState, now: number) => {
      if (next !== state) {
        state = next;
        transitions.push({ state: next, atMs: now - start });
      }
    };

    const finish = (final: LoadOutcome["state"], now: number): LoadOutcome => {
      moveTo(final, now);
      return { state: final, elapsedMs: now - start, samples, transitions, lastSampleError };
    };

    for (;;) {
      throwIfCancelled(signal);

      let active: number;
      try {
        active = activeSignalCount(await sample());
        lastSampleError = undefined;
      } catch (error) {
        throwIfCancelled(signal);
        // An unreadable page (mid-navigation, detached frame) counts as still loading.
        active = 1;
        lastSampleError = errorMessage(error);
      }
      samples++;

      const now = clock.now();
      const elapsed = now - start;

      if (active > 0) {
        quietSince = null;
        moveTo("loading", now);
      } else if (quietSince === null) {
        quietSince = now;
        moveTo("stableCandidate", now);
      }

      if (quietSince !== null && now - quietSince >= settleMs) {
        return finish("ready", now);
      }
      if (elapsed >= maxWaitMs) {
        return finish("timedOut", now);
      }

      const untilDeadline = maxWaitMs - elapsed;
      const untilSettled = quietSince !== null ? quietSince + settleMs - now : Number.POSITIVE_INFINITY;
      await clock.sleep(Math.min(pollIntervalMs, untilDeadline, untilSettled), signal);
    }
  }
}

import { describe, it, expect } from "vitest";
import type { LoadSignals } from "@report-describer/extractors";
import { CancelledError } from "./errors";
import { LoadCompletionDetector } from "./loadDetector";
import { throwIfCancelled, type Clock } from "./policies";

class FakeClock implements Clock {
  time = 0;

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    this.time += ms;
  }
}

function spinners(count: number): LoadSignals {
  return { loadingIndicators: count, documentLoading: false, missingReadyElements: 0 };
}

function detectorWith(clock: FakeClock): LoadCompletionDetector {
  return new LoadCompletionDetector({ maxWaitMs: 60000, settleMs: 2000, pollIntervalMs: 250, clock });
}

describe("LoadCompletionDetector", () => {
  it("should become ready one settle window after the signals drop to zero", async () => {
    const clock = new FakeClock();
    const sample = async () => spinners(clock.now() < 1000 ? 5 : 0);

    const outcome = await detectorWith(clock).waitUntilReady(sample);

    expect(outcome.state).toBe("ready");
    expect(outcome.elapsedMs).toBe(3000);
    expect(outcome.samples).toBe(13);
    expect(outcome.transitions).toEqual([
      { state: "loading", atMs: 0 },
      { state: "stableCandidate", atMs: 1000 },
      { state: "ready", atMs: 3000 },
    ]);
  });

  it("should not report ready on a zero reading at the start", async () => {
    const clock = new FakeClock();

    const outcome = await detectorWith(clock).waitUntilReady(async () => spinners(0));

    expect(outcome.state).toBe("ready");
    expect(outcome.elapsedMs).toBe(2000);
    expect(outcome.transitions).toEqual([
      { state: "loading", atMs: 0 },
      { state: "stableCandidate", atMs: 0 },
      { state: "ready", atMs: 2000 },
    ]);
  });

  it("should time out at the ceiling when signals never clear", async () => {
    const clock = new FakeClock();

    const outcome = await detectorWith(clock).waitUntilReady(async () => spinners(1));

    expect(outcome.state).toBe("timedOut");
    expect(outcome.elapsedMs).toBe(60000);
    expect(outcome.transitions).toEqual([
      { state: "loading", atMs: 0 },
      { state: "timedOut", atMs: 60000 },
    ]);
  });

  it("should restart the settle window when loading resumes", async () => {
    const clock = new FakeClock();
    const sample = async () => {
      const t = clock.now();
      return spinners(t >= 1000 && t < 1500 ? 2 : 0);
    };

    const outcome = await detectorWith(clock).waitUntilReady(sample);

    expect(outcome.state).toBe("ready");
    expect(outcome.elapsedMs).toBe(3500);
    expect(outcome.transitions).toEqual([
      { state: "loading", atMs: 0 },
      { state: "stableCandidate", atMs: 0 },
      { state: "loading", atMs: 1000 },
      { state: "stableCandidate", atMs: 1500 },
      { state: "ready", atMs: 3500 },
    ]);
  });

  it("should count document loading and missing ready elements as activity", async () => {
    const clock = new FakeClock();
    const sample = async (): Promise<LoadSignals> => ({
      loadingIndicators: 0,
      documentLoading: clock.now() < 500,
      missingReadyElements: clock.now() < 1000 ? 1 : 0,
    });

    const outcome = await detectorWith(clock).waitUntilReady(sample);

    expect(outcome.state).toBe("ready");
    expect(outcome.elapsedMs).toBe(3000);
  });

  it("should treat an unreadable sample as still loading", async () => {
    const clock = new FakeClock();
    const sample = async () => {
      if (clock.now() === 0) {
        throw new Error("Execution context was destroyed");
      }
      return spinners(0);
    };

    const outcome = await detectorWith(clock).waitUntilReady(sample);

    expect(outcome.state).toBe("ready");
    expect(outcome.elapsedMs).toBe(2250);
    expect(outcome.lastSampleError).toBeUndefined();
  });

  it("should keep the last sample error when timing out", async () => {
    const clock = new FakeClock();
    const detector = new LoadCompletionDetector({ maxWaitMs: 1000, settleMs: 2000, pollIntervalMs: 250, clock });

    const outcome = await detector.waitUntilReady(async () => {
      throw new Error("Target closed");
    });

    expect(outcome.state).toBe("timedOut");
    expect(outcome.elapsedMs).toBe(1000);
    expect(outcome.lastSampleError).toBe("Target closed");
  });

  it("should stop with CancelledError when the signal is aborted", async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    const sample = async () => {
      if (clock.now() >= 500) {
        controller.abort(new Error("report timeout"));
      }
      return spinners(3);
    };

    const wait = detectorWith(clock).waitUntilReady(sample, controller.signal);

    await expect(wait).rejects.toBeInstanceOf(CancelledError);
    await expect(detectorWith(new FakeClock()).waitUntilReady(sample, controller.signal)).rejects.toThrow(
      "Cancelled: report timeout"
    );
  });

  it("should keep no state between calls", async () => {
    const clock = new FakeClock();
    const detector = detectorWith(clock);

    const first = await detector.waitUntilReady(async () => spinners(0));
    const second = await detector.waitUntilReady(async () => spinners(0));

    expect(first.elapsedMs).toBe(2000);
    expect(second.elapsedMs).toBe(2000);
    expect(clock.now()).toBe(4000);
  });
});

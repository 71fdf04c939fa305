/**
 * Tests for TaskQueue.
 *
 * Verifies:
 * - At most one running and one pending instance per key
 * - The pending instance carries the latest payload
 * - Redelivery with backoff, then dead letters
 * - Registration errors and stop()
 */

import { describe, it, expect, vi } from "vitest";
import { ManualClock, ValidationError } from "@quire/types";
import { TaskQueue } from "../src/services/task-queue.js";

interface TestTasks {
  echo: { readonly n: number };
  other: { readonly n: number };
}

const NO_JITTER = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 };

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

function createQueue(options: { maxDeliveries?: number } = {}) {
  const sleepFn = vi.fn<(ms: number) => Promise<void>>(async () => {});
  const clock = new ManualClock("2026-03-01T09:00:00.000Z");
  const queue = new TaskQueue<TestTasks>({ backoff: NO_JITTER, sleepFn, clock, ...options });
  return { queue, sleepFn };
}

// =============================================================================
// De-duplication
// =============================================================================

describe("enqueue", () => {
  it("starts a task immediately when its key is idle", async () => {
    const { queue } = createQueue();
    const seen: number[] = [];
    queue.register("echo", async ({ n }) => {
      seen.push(n);
    });

    expect(queue.enqueue("echo", "k", { n: 1 })).toBe("started");
    await queue.drain();

    expect(seen).toEqual([1]);
    expect(queue.stats()).toEqual({ running: 0, pending: 0, processed: 1, redelivered: 0, deadLetters: 0 });
  });

  it("keeps one pending instance with the latest payload", async () => {
    const { queue } = createQueue();
    const gate = deferred();
    const seen: number[] = [];
    queue.register("echo", async ({ n }) => {
      seen.push(n);
      if (n === 1) {
        await gate.promise;
      }
    });

    expect(queue.enqueue("echo", "k", { n: 1 })).toBe("started");
    expect(queue.enqueue("echo", "k", { n: 2 })).toBe("pending");
    expect(queue.enqueue("echo", "k", { n: 3 })).toBe("deduplicated");
    expect(queue.stats().pending).toBe(1);

    gate.release();
    await queue.drain();

    expect(seen).toEqual([1, 3]);
    expect(queue.stats().processed).toBe(2);
  });

  it("runs different keys side by side", async () => {
    const { queue } = createQueue();
    const gate = deferred();
    queue.register("echo", async () => {
      await gate.promise;
    });

    expect(queue.enqueue("echo", "a", { n: 1 })).toBe("started");
    expect(queue.enqueue("echo", "b", { n: 1 })).toBe("started");
    expect(queue.isRunning("echo", "a")).toBe(true);
    expect(queue.isRunning("echo", "b")).toBe(true);

    gate.release();
    await queue.drain();

    expect(queue.isRunning("echo", "a")).toBe(false);
  });

  it("keeps task types apart under the same key", async () => {
    const { queue } = createQueue();
    const gate = deferred();
    queue.register("echo", async () => {
      await gate.promise;
    });
    queue.register("other", async () => {});

    queue.enqueue("echo", "k", { n: 1 });
    expect(queue.enqueue("other", "k", { n: 1 })).toBe("started");

    gate.release();
    await queue.drain();
  });
});

// =============================================================================
// Redelivery
// =============================================================================

describe("redelivery", () => {
  it("redelivers a failed task with exponential backoff", async () => {
    const { queue, sleepFn } = createQueue();
    let calls = 0;
    queue.register("echo", async () => {
      calls++;
      if (calls < 3) {
        throw new Error("transient");
      }
    });

    queue.enqueue("echo", "k", { n: 1 });
    await queue.drain();

    expect(calls).toBe(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(queue.stats()).toMatchObject({ processed: 1, redelivered: 2, deadLetters: 0 });
  });

  it("moves a task to dead letters after maxDeliveries", async () => {
    const { queue } = createQueue({ maxDeliveries: 3 });
    const handler = vi.fn(async () => {
      throw new Error("boom");
    });
    queue.register("echo", handler);

    queue.enqueue("echo", "k", { n: 1 });
    await queue.drain();

    expect(handler).toHaveBeenCalledTimes(3);
    expect(queue.deadLetters).toEqual([
      { type: "echo", key: "k", deliveries: 3, error: "boom", failedAt: "2026-03-01T09:00:00.000Z" },
    ]);
  });

  it("runs the pending instance after a dead letter", async () => {
    const { queue } = createQueue({ maxDeliveries: 1 });
    const gate = deferred();
    const seen: number[] = [];
    queue.register("echo", async ({ n }) => {
      seen.push(n);
      if (n === 1) {
        await gate.promise;
        throw new Error("boom");
      }
    });

    queue.enqueue("echo", "k", { n: 1 });
    queue.enqueue("echo", "k", { n: 2 });
    gate.release();
    await queue.drain();

    expect(seen).toEqual([1, 2]);
    expect(queue.stats()).toMatchObject({ processed: 1, deadLetters: 1 });
  });
});

// =============================================================================
// Registration and shutdown
// =============================================================================

describe("registration", () => {
  it("rejects a second handler for the same type", () => {
    const { queue } = createQueue();
    queue.register("echo", async () => {});

    expect(() => queue.register("echo", async () => {})).toThrow(ValidationError);
  });

  it("rejects tasks without a handler", () => {
    const { queue } = createQueue();

    expect(() => queue.enqueue("other", "k", { n: 1 })).toThrow('No handler registered for task "other"');
  });
});

describe("stop", () => {
  it("waits for running tasks and drops new ones", async () => {
    const { queue } = createQueue();
    const gate = deferred();
    const seen: number[] = [];
    queue.register("echo", async ({ n }) => {
      await gate.promise;
      seen.push(n);
    });

    queue.enqueue("echo", "k", { n: 1 });
    const stopped = queue.stop();
    expect(queue.enqueue("echo", "k2", { n: 2 })).toBe("dropped");

    gate.release();
    await stopped;

    expect(seen).toEqual([1]);
    expect(queue.stats().running).toBe(0);
  });
});

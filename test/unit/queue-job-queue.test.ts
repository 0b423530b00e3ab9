import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createSilentLogger } from "../../src/logging/logger.js";
import { NetworkError, RateLimitError } from "../../src/providers/errors.js";
import { JobQueue } from "../../src/queue/job-queue.js";
import { backoffDelay, PROVIDER_RETRY_POLICY, type RetryRule } from "../../src/queue/retry-policy.js";
import { taskSchemas } from "../../src/queue/types.js";
import { ColloquyDB } from "../../src/store/db.js";
import { TestClock } from "../helpers/fixtures.js";

describe("backoffDelay", () => {
  const exponential: RetryRule = { match: Error, attempts: 3, backoff: "exponential", baseDelayMs: 5_000, factor: 5 };

  it("returns the base delay for fixed rules", () => {
    const fixed: RetryRule = { match: Error, attempts: 2, backoff: "fixed", baseDelayMs: 5_000 };
    expect(backoffDelay(fixed, 1, () => 0.3)).toBe(5_000);
  });

  it("grows by the factor and jitters into the upper half", () => {
    expect(backoffDelay(exponential, 1, () => 1)).toBe(5_000);
    expect(backoffDelay(exponential, 2, () => 1)).toBe(25_000);
    expect(backoffDelay(exponential, 2, () => 0)).toBe(12_500);
  });

  it("caps at the rule's maximum", () => {
    expect(backoffDelay({ ...exponential, maxDelayMs: 8_000 }, 3, () => 1)).toBe(8_000);
  });
});

describe("JobQueue", () => {
  let dir: string;
  let db: ColloquyDB;
  let clock: TestClock;
  let queue: JobQueue;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "colloquy-queue-"));
    db = new ColloquyDB(dir);
    clock = new TestClock();
    queue = new JobQueue(db, { pollIntervalMs: 1_000, concurrency: 2, batchSize: 10 }, createSilentLogger(), {
      clock: clock.read,
      random: () => 0,
    });
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("runs a job with validated arguments and marks it done", async () => {
    const handler = vi.fn(async () => {});
    queue.register("consolidate-conversation", taskSchemas["consolidate-conversation"], { handler });

    queue.submit("consolidate-conversation", { chatId: "chat-1" });
    expect(await queue.drain()).toBe(1);

    expect(handler).toHaveBeenCalledWith({ chatId: "chat-1" }, expect.objectContaining({ attempt: 1 }));
    expect(queue.stats()).toEqual({ pending: 0, running: 0, done: 1, failed: 0 });
  });

  it("leaves delayed jobs until they are due", async () => {
    const handler = vi.fn(async () => {});
    queue.register("memory-reflection", taskSchemas["memory-reflection"], { handler });

    queue.submit("memory-reflection", {}, { delayMs: 60_000 });
    await queue.drain();
    expect(handler).not.toHaveBeenCalled();

    clock.advance(60_000);
    await queue.drain();
    expect(handler).toHaveBeenCalledOnce();
  });

  it("reschedules a matching failure with the rule's backoff", async () => {
    const attempts: number[] = [];
    queue.register("memory-reflection", taskSchemas["memory-reflection"], {
      retryPolicy: PROVIDER_RETRY_POLICY,
      handler: async (_args, ctx) => {
        attempts.push(ctx.attempt);
        if (ctx.attempt === 1) throw new RateLimitError("slow down", 429);
      },
    });

    queue.submit("memory-reflection", {});
    await queue.drain();
    expect(queue.stats().pending).toBe(1);

    clock.advance(4_999);
    await queue.drain();
    expect(attempts).toEqual([1]);

    clock.advance(1);
    await queue.drain();
    expect(attempts).toEqual([1, 2]);
    expect(queue.stats().done).toBe(1);
  });

  it("fails after the rule's attempts and runs the exhaustion hook once", async () => {
    const onExhausted = vi.fn();
    queue.register("agent-response", taskSchemas["agent-response"], {
      retryPolicy: PROVIDER_RETRY_POLICY,
      handler: async () => {
        throw new NetworkError("socket hang up");
      },
      onExhausted,
    });

    queue.submit("agent-response", { chatId: "c", agentId: "a" });
    for (let i = 0; i < 5; i++) {
      await queue.drain();
      clock.advance(60_000);
    }

    expect(queue.stats().failed).toBe(1);
    expect(onExhausted).toHaveBeenCalledOnce();
    expect(onExhausted).toHaveBeenCalledWith({ chatId: "c", agentId: "a" }, expect.any(NetworkError));
  });

  it("fails immediately on an error no rule matches", async () => {
    const onExhausted = vi.fn();
    queue.register("memory-reflection", taskSchemas["memory-reflection"], {
      retryPolicy: PROVIDER_RETRY_POLICY,
      handler: async () => {
        throw new Error("bug");
      },
      onExhausted,
    });

    queue.submit("memory-reflection", {});
    await queue.drain();
    expect(queue.stats().failed).toBe(1);
    expect(onExhausted).toHaveBeenCalledOnce();
  });

  it("lets a per-job policy override the task default", async () => {
    let calls = 0;
    queue.register("memory-reflection", taskSchemas["memory-reflection"], {
      handler: async () => {
        calls++;
        if (calls === 1) throw new RateLimitError("slow down", 429);
      },
    });

    queue.submit("memory-reflection", {}, { retryPolicy: PROVIDER_RETRY_POLICY });
    await queue.drain();
    clock.advance(5_000);
    await queue.drain();
    expect(calls).toBe(2);
    expect(queue.stats().done).toBe(1);
  });

  it("fails jobs for tasks without a handler", async () => {
    queue.submit("memory-refinement", {});
    await queue.drain();
    expect(queue.stats().failed).toBe(1);
  });

  it("runs higher-priority jobs first", async () => {
    const order: string[] = [];
    const single = new JobQueue(db, { pollIntervalMs: 1_000, concurrency: 1, batchSize: 1 }, createSilentLogger(), {
      clock: clock.read,
    });
    single.register("consolidate-conversation", taskSchemas["consolidate-conversation"], {
      handler: async ({ chatId }) => {
        order.push(chatId);
      },
    });

    single.submit("consolidate-conversation", { chatId: "low" }, { priority: -1 });
    single.submit("consolidate-conversation", { chatId: "normal" });
    await single.drain();
    expect(order).toEqual(["normal", "low"]);
  });

  it("processes jobs from the polling loop and waits for them on stop", async () => {
    vi.useFakeTimers();
    try {
      const handler = vi.fn(async () => {});
      queue.register("memory-reflection", taskSchemas["memory-reflection"], { handler });
      queue.submit("memory-reflection", {});

      queue.start();
      await vi.advanceTimersByTimeAsync(1_000);
      await queue.stop();

      expect(handler).toHaveBeenCalledOnce();
      expect(queue.stats().done).toBe(1);
    } finally {
      vi.useRealTimers();
    }
  });
  it("logs a job whose status cannot be recorded instead of rejecting the loop", async () => {
    vi.useFakeTimers();
    try {
      const logger = createSilentLogger();
      const logged = vi.spyOn(logger, "error");
      const closing = new JobQueue(db, { pollIntervalMs: 1_000, concurrency: 1, batchSize: 10 }, logger, {
        clock: clock.read,
      });
      closing.register("memory-reflection", taskSchemas["memory-reflection"], {
        handler: async () => {
          db.close();
        },
      });
      const jobId = closing.submit("memory-reflection", {});

      closing.start();
      await vi.advanceTimersByTimeAsync(1_000);
      await closing.stop();

      expect(logged).toHaveBeenCalledWith(
        expect.objectContaining({ jobId, task: "memory-reflection" }),
        "Job bookkeeping failed",
      );
    } finally {
      vi.useRealTimers();
    }
  });
});

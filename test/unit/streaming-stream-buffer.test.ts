import { describe, it, expect, vi } from "vitest";
import { StreamBuffer } from "../../src/streaming/stream-buffer.js";
import { createSilentLogger } from "../../src/logging/logger.js";

function setup(intervalMs = 200) {
  let now = 1_000;
  const flushed: string[] = [];
  const buffer = new StreamBuffer(intervalMs, (text) => flushed.push(text), { clock: () => now });
  return {
    buffer,
    flushed,
    at: (t: number) => {
      now = t;
    },
  };
}

describe("StreamBuffer", () => {
  it("flushes the first chunk immediately when never primed", () => {
    const { buffer, flushed } = setup();
    buffer.enqueue("Hi");
    expect(flushed).toEqual(["Hi"]);
    expect(buffer.pending).toBe("");
  });

  it("coalesces chunks arriving inside the interval into a single flush", () => {
    const { buffer, flushed, at } = setup(200);
    buffer.reset(1_000);
    at(1_000);
    buffer.enqueue("Hel");
    at(1_020);
    buffer.enqueue("lo, ");
    at(1_050);
    buffer.enqueue("world");
    expect(flushed).toEqual([]);

    buffer.flush();
    expect(flushed).toEqual(["Hello, world"]);
  });

  it("flushes once the interval has elapsed since the last flush", () => {
    const { buffer, flushed, at } = setup(200);
    buffer.reset(1_000);
    buffer.enqueue("a");
    at(1_199);
    buffer.enqueue("b");
    expect(flushed).toEqual([]);
    at(1_200);
    buffer.enqueue("c");
    expect(flushed).toEqual(["abc"]);
    at(1_300);
    buffer.enqueue("d");
    expect(flushed).toEqual(["abc"]);
    expect(buffer.pending).toBe("d");
  });

  it("delivers every chunk exactly once and in order", () => {
    const { buffer, flushed, at } = setup(100);
    const chunks = ["The ", "quick ", "brown ", "fox ", "jumps"];
    chunks.forEach((chunk, i) => {
      at(1_000 + i * 60);
      buffer.enqueue(chunk);
    });
    buffer.flush();
    expect(flushed.join("")).toBe(chunks.join(""));
    expect(buffer.accumulated).toBe(chunks.join(""));
  });

  it("ignores empty and missing chunks", () => {
    const { buffer, flushed } = setup();
    buffer.enqueue("");
    buffer.enqueue(null);
    buffer.enqueue(undefined);
    buffer.flush();
    expect(flushed).toEqual([]);
    expect(buffer.accumulated).toBe("");
  });

  it("keeps the text buffered when the sink throws", () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, "warn");
    let fail = true;
    const delivered: string[] = [];
    const buffer = new StreamBuffer(
      200,
      (text) => {
        if (fail) throw new Error("socket closed");
        delivered.push(text);
      },
      { clock: () => 0, logger },
    );

    buffer.enqueue("partial");
    expect(buffer.pending).toBe("partial");
    expect(warn).toHaveBeenCalledTimes(1);

    fail = false;
    buffer.flush();
    expect(delivered).toEqual(["partial"]);
    expect(buffer.pending).toBe("");
  });

  it("reset clears buffered and accumulated text", () => {
    const { buffer } = setup();
    buffer.reset(1_000);
    buffer.enqueue("left over");
    buffer.reset(1_000);
    expect(buffer.pending).toBe("");
    expect(buffer.accumulated).toBe("");
  });
});

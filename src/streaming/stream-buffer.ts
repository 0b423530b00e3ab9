import type { Logger } from "../logging/logger.js";
import { systemClock, type Clock } from "../utils/clock.js";

export type FlushSink = (text: string) => void;

export interface StreamBufferOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Batches streamed chunks into time-spaced writes. Every chunk reaches the
 * sink exactly once and in arrival order; `accumulated` keeps the whole
 * text for the turn so finalization can fall back on it.
 */
export class StreamBuffer {
  private buffer = "";
  private fullText = "";
  private lastFlushAt: number | null = null;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  constructor(
    readonly intervalMs: number,
    private readonly sink: FlushSink,
    options: StreamBufferOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  get accumulated(): string {
    return this.fullText;
  }

  get pending(): string {
    return this.buffer;
  }

  enqueue(chunk: string | null | undefined): void {
    if (!chunk) return;
    this.buffer += chunk;
    this.fullText += chunk;
    if (this.shouldFlush(this.clock())) this.flush();
  }

  shouldFlush(now: number): boolean {
    return this.lastFlushAt === null || now - this.lastFlushAt >= this.intervalMs;
  }

  /**
   * Hands the buffered text to the sink. A failing sink keeps the text
   * buffered for the next flush.
   */
  flush(): void {
    if (this.buffer === "") return;
    const text = this.buffer;
    try {
      this.sink(text);
    } catch (err) {
      this.logger?.warn({ err, pending: text.length }, "Stream flush failed, keeping buffer");
      return;
    }
    this.buffer = "";
    this.lastFlushAt = this.clock();
  }

  /** Starts a new message: clears everything and counts `now` as a flush. */
  reset(now: number = this.clock()): void {
    this.buffer = "";
    this.fullText = "";
    this.lastFlushAt = now;
  }
}

import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type { ColloquyDB } from "../store/db.js";
import type { Logger } from "../logging/logger.js";
import type { QueueConfig } from "../config/types.js";
import { tryParseJson } from "../utils/json.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { backoffDelay, findRule, NO_RETRY, type RetryPolicy } from "./retry-policy.js";
import type {
  JobStatus,
  QueueStats,
  SubmitOptions,
  TaskArgs,
  TaskContext,
  TaskDefinition,
  TaskName,
  TaskQueue,
} from "./types.js";

interface JobRow {
  id: string;
  task: string;
  args: string;
  status: JobStatus;
  attempts: number;
  run_at: number;
  last_error: string | null;
  retry_policy: string | null;
}

interface RegisteredTask {
  readonly retryPolicy: RetryPolicy;
  run(rawArgs: unknown, ctx: TaskContext): Promise<void>;
  exhausted(rawArgs: unknown, err: unknown): Promise<void>;
}

export interface JobQueueOptions {
  readonly clock?: Clock;
  readonly random?: () => number;
}

/**
 * Durable task queue on the `jobs` table. A poll loop claims due jobs up to
 * the configured concurrency; failures are retried per the job's policy.
 */
export class JobQueue implements TaskQueue {
  private readonly db;
  private readonly tasks = new Map<string, RegisteredTask>();
  private readonly policies = new Map<string, RetryPolicy>();
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly inFlight = new Set<Promise<void>>();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    colloquyDb: ColloquyDB,
    private readonly config: QueueConfig,
    private readonly logger: Logger,
    options: JobQueueOptions = {},
  ) {
    this.db = colloquyDb.raw();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  register<N extends TaskName>(
    task: N,
    schema: z.ZodType<TaskArgs<N>, z.ZodTypeDef, unknown>,
    definition: TaskDefinition<TaskArgs<N>>,
  ): void {
    const retryPolicy = definition.retryPolicy ?? NO_RETRY;
    this.policies.set(retryPolicy.name, retryPolicy);
    this.tasks.set(task, {
      retryPolicy,
      run: (rawArgs, ctx) => definition.handler(schema.parse(rawArgs), ctx),
      exhausted: async (rawArgs, err) => {
        const parsed = schema.safeParse(rawArgs);
        if (parsed.success && definition.onExhausted) {
          await definition.onExhausted(parsed.data, err);
        }
      },
    });
  }

  submit<N extends TaskName>(task: N, args: TaskArgs<N>, options: SubmitOptions = {}): string {
    const id = randomUUID();
    const now = this.clock();
    if (options.retryPolicy) this.policies.set(options.retryPolicy.name, options.retryPolicy);

    this.db
      .prepare(
        `INSERT INTO jobs (id, task, args, status, attempts, priority, run_at, retry_policy, created_at, updated_at)
         VALUES (?, ?, ?, 'pending', 0, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        task,
        JSON.stringify(args),
        options.priority ?? 0,
        now + (options.delayMs ?? 0),
        options.retryPolicy?.name ?? null,
        now,
        now,
      );
    this.logger.debug({ jobId: id, task, delayMs: options.delayMs ?? 0 }, "Job submitted");
    return id;
  }

  start(): void {
    if (this.timer) return;
    const recovered = this.db
      .prepare("UPDATE jobs SET status = 'pending', updated_at = ? WHERE status = 'running'")
      .run(this.clock()).changes;
    if (recovered > 0) this.logger.warn({ recovered }, "Requeued jobs left running by a previous process");

    this.timer = setInterval(() => this.tick(), this.config.pollIntervalMs);
    this.logger.info({ pollIntervalMs: this.config.pollIntervalMs, concurrency: this.config.concurrency }, "Job queue started");
  }

  /** Stops polling and waits for jobs already running. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.all([...this.inFlight]);
  }

  /** Runs every job due right now and resolves once they settle. */
  async runDue(): Promise<number> {
    let ran = 0;
    for (;;) {
      const jobs = this.claim(this.config.batchSize);
      if (jobs.length === 0) return ran;
      ran += jobs.length;
      await Promise.all(jobs.map((job) => this.execute(job)));
    }
  }

  /** Repeats `runDue` until a pass finds nothing due, following jobs that submit jobs. */
  async drain(maxPasses = 100): Promise<number> {
    let total = 0;
    for (let pass = 0; pass < maxPasses; pass++) {
      const ran = await this.runDue();
      if (ran === 0) break;
      total += ran;
    }
    return total;
  }

  stats(): QueueStats {
    const counts: QueueStats = { pending: 0, running: 0, done: 0, failed: 0 };
    const rows = this.db
      .prepare<[], { status: JobStatus; n: number }>("SELECT status, COUNT(*) AS n FROM jobs GROUP BY status")
      .all();
    for (const row of rows) counts[row.status] = row.n;
    return counts;
  }

  private tick(): void {
    const free = this.config.concurrency - this.inFlight.size;
    if (free <= 0) return;
    for (const job of this.claim(free)) {
      const running = this.execute(job)
        .catch((err: unknown) => {
          this.logger.error({ err, jobId: job.id, task: job.task }, "Job bookkeeping failed");
        })
        .finally(() => this.inFlight.delete(running));
      this.inFlight.add(running);
    }
  }

  private claim(limit: number): JobRow[] {
    const now = this.clock();
    const select = this.db.prepare<[number, number], JobRow>(
      `SELECT id, task, args, status, attempts, run_at, last_error, retry_policy FROM jobs
       WHERE status = 'pending' AND run_at <= ?
       ORDER BY priority DESC, run_at, created_at
       LIMIT ?`,
    );
    const mark = this.db.prepare(
      "UPDATE jobs SET status = 'running', attempts = attempts + 1, updated_at = ? WHERE id = ?",
    );
    const claimAll = this.db.transaction(() => {
      const rows = select.all(now, limit);
      for (const row of rows) mark.run(now, row.id);
      return rows.map((row) => ({ ...row, status: "running" as const, attempts: row.attempts + 1 }));
    });
    return claimAll();
  }

  private async execute(job: JobRow): Promise<void> {
    const task = this.tasks.get(job.task);
    if (!task) {
      this.finish(job.id, "failed", `Unknown task: ${job.task}`);
      this.logger.error({ jobId: job.id, task: job.task }, "No handler registered for job");
      return;
    }

    const parsed = tryParseJson(job.args);
    const rawArgs = parsed.ok ? parsed.value : undefined;

    try {
      await task.run(rawArgs, { jobId: job.id, attempt: job.attempts });
      this.finish(job.id, "done", null);
    } catch (err) {
      const policy = (job.retry_policy ? this.policies.get(job.retry_policy) : undefined) ?? task.retryPolicy;
      const rule = findRule(policy, err);
      const message = err instanceof Error ? err.message : String(err);

      if (rule && job.attempts < rule.attempts) {
        const delayMs = backoffDelay(rule, job.attempts, this.random);
        this.db
          .prepare("UPDATE jobs SET status = 'pending', run_at = ?, last_error = ?, updated_at = ? WHERE id = ?")
          .run(this.clock() + delayMs, message, this.clock(), job.id);
        this.logger.warn({ err, jobId: job.id, task: job.task, attempt: job.attempts, delayMs }, "Job failed, retrying");
        return;
      }

      this.finish(job.id, "failed", message);
      this.logger.error({ err, jobId: job.id, task: job.task, attempts: job.attempts }, "Job failed");
      try {
        await task.exhausted(rawArgs, err);
      } catch (hookErr) {
        this.logger.error({ err: hookErr, jobId: job.id, task: job.task }, "Exhaustion hook failed");
      }
    }
  }

  private finish(id: string, status: "done" | "failed", error: string | null): void {
    this.db
      .prepare("UPDATE jobs SET status = ?, last_error = COALESCE(?, last_error), updated_at = ? WHERE id = ?")
      .run(status, error, this.clock(), id);
  }
}

import { Cron } from "croner";
import type { ColloquyConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { TaskArgs, TaskName, TaskQueue } from "../queue/types.js";

export interface ScheduledSweep<N extends TaskName = TaskName> {
  readonly name: string;
  readonly pattern: string;
  readonly task: N;
  readonly args: TaskArgs<N>;
}

/** The periodic sweeps implied by config; nighttime initiation only when scheduled. */
export function sweepSchedules(config: ColloquyConfig): ScheduledSweep[] {
  const { schedules } = config.memory;
  const sweeps: ScheduledSweep[] = [
    { name: "consolidation", pattern: schedules.consolidation, task: "consolidate-stale", args: {} },
    { name: "reflection", pattern: schedules.reflection, task: "memory-reflection", args: {} },
    { name: "refinement", pattern: schedules.refinement, task: "memory-refinement", args: {} },
  ];
  if (config.initiation.enabled) {
    sweeps.push({
      name: "initiation-daytime",
      pattern: config.initiation.schedules.daytime,
      task: "initiation-sweep",
      args: { variant: "daytime" },
    });
    const nighttime = config.initiation.schedules.nighttime;
    if (nighttime) {
      sweeps.push({ name: "initiation-nighttime", pattern: nighttime, task: "initiation-sweep", args: { variant: "nighttime" } });
    }
  }
  return sweeps;
}

/** Submits sweep tasks to the queue on cron patterns. */
export class SweepScheduler {
  private readonly scheduled = new Map<string, Cron>();
  private readonly logger: Logger;

  constructor(
    private readonly queue: TaskQueue,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "scheduler" });
  }

  start(sweeps: readonly ScheduledSweep[]): void {
    for (const sweep of sweeps) this.schedule(sweep);
    this.logger.info({ count: this.scheduled.size }, "Scheduler started");
  }

  stop(): void {
    for (const [name, cron] of this.scheduled) {
      cron.stop();
      this.logger.debug({ sweep: name }, "Stopped schedule");
    }
    this.scheduled.clear();
    this.logger.info("Scheduler stopped");
  }

  names(): string[] {
    return [...this.scheduled.keys()];
  }

  nextRun(name: string): Date | null {
    return this.scheduled.get(name)?.nextRun() ?? null;
  }

  /** Queues one sweep now. Returns the job id, or null if submitting failed. */
  fire(sweep: ScheduledSweep): string | null {
    try {
      const jobId = this.queue.submit(sweep.task, sweep.args);
      this.logger.debug({ sweep: sweep.name, jobId }, "Sweep submitted");
      return jobId;
    } catch (err) {
      this.logger.error({ err, sweep: sweep.name }, "Failed to submit sweep");
      return null;
    }
  }

  private schedule(sweep: ScheduledSweep): void {
    this.scheduled.get(sweep.name)?.stop();
    try {
      const cron = new Cron(sweep.pattern, () => {
        this.fire(sweep);
      });
      this.scheduled.set(sweep.name, cron);
      this.logger.debug({ sweep: sweep.name, pattern: sweep.pattern }, "Scheduled sweep");
    } catch (err) {
      this.logger.error({ err, sweep: sweep.name, pattern: sweep.pattern }, "Invalid cron pattern");
    }
  }
}

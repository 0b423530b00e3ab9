import { describe, it, expect, afterEach, vi } from "vitest";
import { SweepScheduler, sweepSchedules, type ScheduledSweep } from "../../src/scheduler/scheduler.js";
import { createTestContext, makeConfig, type TestContext } from "../helpers/fixtures.js";

describe("sweepSchedules", () => {
  it("schedules the memory sweeps by default", () => {
    expect(sweepSchedules(makeConfig()).map((s) => [s.name, s.pattern, s.task])).toEqual([
      ["consolidation", "15 * * * *", "consolidate-stale"],
      ["reflection", "0 3 * * *", "memory-reflection"],
      ["refinement", "0 4 * * *", "memory-refinement"],
    ]);
  });

  it("adds initiation sweeps when enabled", () => {
    const daytimeOnly = sweepSchedules(makeConfig({ initiation: { enabled: true } }));
    expect(daytimeOnly.map((s) => s.name)).toEqual(["consolidation", "reflection", "refinement", "initiation-daytime"]);

    const both = sweepSchedules(makeConfig({ initiation: { enabled: true, schedules: { nighttime: "30 23 * * *" } } }));
    expect(both.slice(3)).toEqual([
      { name: "initiation-daytime", pattern: "0 * * * *", task: "initiation-sweep", args: { variant: "daytime" } },
      { name: "initiation-nighttime", pattern: "30 23 * * *", task: "initiation-sweep", args: { variant: "nighttime" } },
    ]);
  });
});

describe("SweepScheduler", () => {
  let t: TestContext;
  let scheduler: SweepScheduler;

  afterEach(() => {
    scheduler.stop();
    vi.restoreAllMocks();
    t.cleanup();
  });

  function setup(): void {
    t = createTestContext();
    scheduler = new SweepScheduler(t.c.queue, t.c.logger);
  }

  const reflection: ScheduledSweep = { name: "reflection", pattern: "0 3 * * *", task: "memory-reflection", args: {} };

  it("schedules valid patterns and skips invalid ones", () => {
    setup();
    scheduler.start([reflection, { ...reflection, name: "broken", pattern: "not a cron" }]);

    expect(scheduler.names()).toEqual(["reflection"]);
    expect(scheduler.nextRun("reflection")).toBeInstanceOf(Date);
    expect(scheduler.nextRun("broken")).toBeNull();

    scheduler.stop();
    expect(scheduler.names()).toEqual([]);
  });

  it("submits the sweep task when fired", () => {
    setup();
    expect(scheduler.fire(reflection)).toEqual(expect.any(String));
    expect(t.c.queue.stats().pending).toBe(1);
  });

  it("returns null when the submit fails", () => {
    setup();
    vi.spyOn(t.c.queue, "submit").mockImplementation(() => {
      throw new Error("database is closed");
    });
    expect(scheduler.fire(reflection)).toBeNull();
  });
});

import { Command, Option } from "clipanion";
import * as t from "typanion";
import type { Components } from "../../gateway/components.js";
import { openRuntime } from "../../gateway/lifecycle.js";

export const SWEEP_NAMES = [
  "consolidation",
  "reflection",
  "refinement",
  "initiation-daytime",
  "initiation-nighttime",
] as const;

const SWEEPS: Record<(typeof SWEEP_NAMES)[number], (c: Components) => string> = {
  consolidation: (c: Components) => c.queue.submit("consolidate-stale", {}),
  reflection: (c: Components) => c.queue.submit("memory-reflection", {}),
  refinement: (c: Components) => c.queue.submit("memory-refinement", {}),
  "initiation-daytime": (c: Components) => c.queue.submit("initiation-sweep", { variant: "daytime" }),
  "initiation-nighttime": (c: Components) => c.queue.submit("initiation-sweep", { variant: "nighttime" }),
};

export class SweepCommand extends Command {
  static override paths = [["sweep"]];

  static override usage = Command.Usage({
    description: "Queue one sweep and run the queue until it is idle",
    details: `Available sweeps: ${SWEEP_NAMES.join(", ")}.`,
    examples: [
      ["Consolidate idle conversations now", "colloquy sweep consolidation"],
      ["Run the daytime initiation sweep", "colloquy sweep initiation-daytime"],
    ],
  });

  name = Option.String({
    name: "sweep",
    validator: t.isEnum(SWEEP_NAMES),
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number> {
    const runtime = openRuntime({ configPath: this.config });
    try {
      const jobId = SWEEPS[this.name](runtime);
      const ran = await runtime.queue.drain();
      const stats = runtime.queue.stats();
      this.context.stdout.write(`Sweep ${this.name} queued as ${jobId}; ran ${ran} job(s), ${stats.failed} failed in total\n`);
      return 0;
    } finally {
      runtime.db.close();
    }
  }
}

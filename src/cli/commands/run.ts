import { Command, Option } from "clipanion";
import { startRuntime } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the runtime: queue worker, sweep schedules and health server",
    examples: [
      ["Start with default config", "colloquy run"],
      ["Start with custom config", "colloquy run --config ./colloquy.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(this.cli.binaryVersion ?? "0.0.0");

    let runtime;
    try {
      runtime = startRuntime({ configPath: this.config });
    } catch (err) {
      this.context.stderr.write(`Failed to start runtime: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }

    const { stop } = runtime;
    await new Promise<void>((resolve) => {
      const done = (): void => {
        stop().then(resolve, resolve);
      };
      process.once("SIGTERM", done);
      process.once("SIGINT", done);
    });
    return 0;
  }
}

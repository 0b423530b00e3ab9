import { Command, Option } from "clipanion";
import { resolvePaths } from "../../config/paths.js";
import { openRuntime } from "../../gateway/lifecycle.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration summary and task queue counts",
    examples: [["Show status", "colloquy status"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number> {
    const paths = resolvePaths({ configPath: this.config });
    let runtime;
    try {
      runtime = openRuntime({ configPath: this.config });
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${paths.configPath})\n`);
      this.context.stdout.write(`  Error: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }

    const { config, queue, agents, db, selector } = runtime;
    const out = this.context.stdout;
    try {
      const stats = queue.stats();
      const providers = (["openrouter", "anthropic", "openai", "gemini", "xai"] as const).filter(
        (p) => selector.apiKey(p) !== null,
      );
      out.write(`Colloquy Status\n`);
      out.write(`---------------\n`);
      out.write(`Config path: ${paths.configPath}\n`);
      out.write(`Database:    ${paths.databasePath}\n`);
      out.write(`Providers:   ${providers.length > 0 ? providers.join(", ") : "(no keys configured)"}\n`);
      out.write(`Agents:      ${agents.listActive().length} active\n`);
      out.write(`Initiation:  ${config.initiation.enabled ? "enabled" : "disabled"}\n`);
      out.write(`Moderation:  ${config.moderation.enabled ? "enabled" : "disabled"}\n`);
      out.write(
        `Jobs:        ${stats.pending} pending, ${stats.running} running, ${stats.done} done, ${stats.failed} failed\n`,
      );
    } finally {
      db.close();
    }
    return 0;
  }
}

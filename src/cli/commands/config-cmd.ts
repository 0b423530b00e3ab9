import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { ColloquyConfig, ProvidersConfig } from "../../config/types.js";
import { REDACTED } from "../../logging/logger.js";

function mask(value: string | undefined): string | undefined {
  return value ? REDACTED : value;
}

/** A copy of the config with every provider key masked. */
export function redactConfig(config: ColloquyConfig): ColloquyConfig {
  const providers: ProvidersConfig = {
    ...config.providers,
    openrouterApiKey: mask(config.providers.openrouterApiKey),
    anthropicApiKey: mask(config.providers.anthropicApiKey),
    openaiApiKey: mask(config.providers.openaiApiKey),
    geminiApiKey: mask(config.providers.geminiApiKey),
    xaiApiKey: mask(config.providers.xaiApiKey),
  };
  return { ...config, providers };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (API keys redacted)",
    examples: [["Show config", "colloquy config show"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number> {
    let config;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "colloquy config validate"],
      ["Validate specific file", "colloquy config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      parseConfigText(content, configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` + `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
  }
}

import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { RespondCommand } from "./commands/respond.js";
import { RunCommand } from "./commands/run.js";
import { StatusCommand } from "./commands/status.js";
import { SweepCommand } from "./commands/sweep.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Colloquy",
    binaryName: "colloquy",
    binaryVersion: VERSION,
  });

  cli.register(RunCommand);
  cli.register(SweepCommand);
  cli.register(RespondCommand);
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}

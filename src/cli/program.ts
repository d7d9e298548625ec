import { Builtins, Cli } from "clipanion";
import { MonitorCommand } from "./commands/monitor";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "tokentally",
    binaryName: "tokentally",
    binaryVersion: VERSION,
  });

  cli.register(MonitorCommand);
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}

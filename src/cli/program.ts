import { Builtins, Cli } from "clipanion";
import { ServeCommand } from "./commands/serve.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { CheckCommand } from "./commands/check.js";

export function createCli(version: string): Cli {
  const cli = new Cli({
    binaryLabel: "tonewatch",
    binaryName: "tonewatch",
    binaryVersion: version,
  });

  cli.register(ServeCommand);
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);
  cli.register(CheckCommand);
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}

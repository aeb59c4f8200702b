import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };
import { startService } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the moderation webhook and the weekly digest job",
    examples: [
      ["Start with default config", "tonewatch serve"],
      ["Start with custom config", "tonewatch serve --config ./tonewatch.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(pkg.version);

    try {
      await startService(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start tonewatch: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    // Runs until SIGINT/SIGTERM closes the server
    await new Promise<never>(() => {});
    return 0;
  }
}

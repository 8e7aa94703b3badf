import { Command } from "commander";

import { defaultContextLoader, type CliContextLoader } from "./config.js";
import { registerInitCommand } from "./init.js";
import { registerScriptCommands } from "./scripts.js";
import { registerSyncCommands } from "./sync.js";

export type BuildCliOptions = {
  loader?: CliContextLoader;
};

export function buildCli(options: BuildCliOptions = {}): Command {
  const loader = options.loader ?? defaultContextLoader;
  const program = new Command();

  program
    .name("script-inventory")
    .description("Keep a personal script inventory in sync across machines through GitHub Gists")
    .option("--home <dir>", "Inventory directory (default: $SCRIPT_INVENTORY_HOME or ~/.script-inventory)")
    .option("--debug", "Print error causes and stack traces", false)
    .option("--no-color", "Disable colored error output")
    .enablePositionalOptions();

  registerInitCommand(program, loader);
  registerSyncCommands(program, loader);
  registerScriptCommands(program, loader);

  return program;
}

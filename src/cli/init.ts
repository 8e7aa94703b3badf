import type { Command } from "commander";

import { initInventoryConfig } from "../core/config-loader.js";

import type { CliContextLoader, GlobalOptions } from "./config.js";

export function registerInitCommand(program: Command, loader: CliContextLoader): void {
  program
    .command("init")
    .description("Create the inventory config for this machine")
    .requiredOption("--owner <login>", "GitHub login that owns the gists")
    .option("--force", "Overwrite an existing config", false)
    .action((opts: { owner: string; force: boolean }, command: Command) => {
      const paths = loader.paths(command.optsWithGlobals<GlobalOptions>());
      const result = initInventoryConfig({
        configPath: paths.configFile,
        owner: opts.owner,
        force: opts.force,
      });

      if (result.status === "created") {
        console.log(`Created config at ${result.configPath}`);
        console.log("Run `script-inventory sync` to find or create the mapping gist.");
        return;
      }

      if (result.status === "overwritten") {
        console.log(`Overwrote config at ${result.configPath}`);
        return;
      }

      console.log(`Config already exists at ${result.configPath} (use --force to overwrite).`);
    });
}

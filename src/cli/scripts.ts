import type { Command } from "commander";
import fse from "fs-extra";

import type { ScriptEntry } from "../inventory/schema.js";

import type { CliContext, CliContextLoader, GlobalOptions } from "./config.js";
import { printSyncResult, runSync } from "./sync.js";

type PublishOptions = {
  description?: string;
  tag: string[];
  force: boolean;
  local: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerScriptCommands(program: Command, loader: CliContextLoader): void {
  const load = (command: Command): CliContext => loader.context(command.optsWithGlobals<GlobalOptions>());

  program
    .command("list")
    .description("List scripts in the local inventory")
    .option("-t, --tag <tag>", "Only scripts carrying this tag")
    .option("-s, --sync", "Sync with GitHub before listing", false)
    .option("-v, --verbose", "Add each script's description", false)
    .action(async (opts: { tag?: string; sync: boolean; verbose: boolean }, command: Command) => {
      const ctx = load(command);
      if (opts.sync) {
        printSyncResult(await runSync(ctx, "sync"));
      }

      const entries = await ctx.service.listScripts({ tag: opts.tag });
      const descriptions = new Map<string, string>();
      if (opts.verbose) {
        for (const entry of entries) {
          descriptions.set(entry.script_name, (await ctx.service.cachedDescription(entry.script_name)) ?? "-");
        }
      }
      printScriptTable(entries, opts.verbose ? descriptions : undefined);
    });

  withPublishOptions(
    program
      .command("create")
      .description("Create a script from a prompt, or a stub to fill in")
      .argument("<name>", "Script name")
      .option("-p, --prompt <text>", "Describe the script and let the model write it"),
  ).action(async (name: string, opts: PublishOptions & { prompt?: string }, command: Command) => {
    const ctx = load(command);
    let body = stubScript(name);
    let tags = opts.tag;

    if (opts.prompt) {
      const generated = await ctx.createGenerator().generate(opts.prompt, { tags: opts.tag });
      body = generated.text;
      tags = generated.header.tags;
    }

    const entry = await ctx.service.createScript({
      name,
      body,
      description: opts.description,
      tags,
      force: opts.force,
    });
    console.log(`Created ${entry.script_name} at ${ctx.paths.scriptsDir}`);
    await publishUnlessLocal(ctx, opts.local);
  });

  withPublishOptions(
    program
      .command("import")
      .description("Add an existing script file to the inventory")
      .argument("<name>", "Script name")
      .argument("<file>", "Path of the script to import"),
  ).action(async (name: string, file: string, opts: PublishOptions, command: Command) => {
    const ctx = load(command);
    const entry = await ctx.service.importScript(name, file, {
      description: opts.description,
      tags: opts.tag,
      force: opts.force,
    });
    console.log(`Imported ${file} as ${entry.script_name}`);
    await publishUnlessLocal(ctx, opts.local);
  });

  program
    .command("update")
    .description("Replace a script's body with the contents of a file")
    .argument("<name>", "Script name")
    .argument("<file>", "Path of the new version")
    .option("--local", "Skip the push that normally follows", false)
    .action(async (name: string, file: string, opts: { local: boolean }, command: Command) => {
      const ctx = load(command);
      const content = await fse.readFile(file, "utf8");
      const entry = await ctx.service.updateScript(name, content);
      console.log(`Updated ${entry.script_name} (${entry.document_id || "not yet published"})`);
      await publishUnlessLocal(ctx, opts.local);
    });

  program
    .command("show")
    .description("Print a script, downloading it when it is not cached")
    .argument("<name>", "Script name")
    .option("--refresh", "Download again even when cached", false)
    .option("--path", "Print the cached file path instead of the body", false)
    .action(async (name: string, opts: { refresh: boolean; path: boolean }, command: Command) => {
      const fetched = await load(command).service.fetchScript(name, { refresh: opts.refresh });
      if (opts.path) {
        console.log(fetched.path);
        return;
      }
      process.stdout.write(fetched.content);
    });

  program
    .command("run")
    .description("Run a script with uv; arguments after the name are passed through")
    .argument("<name>", "Script name")
    .argument("[args...]", "Arguments for the script")
    .option("--refresh", "Download again even when cached", false)
    .passThroughOptions()
    .action(async (name: string, args: string[], opts: { refresh: boolean }, command: Command) => {
      const exitCode = await load(command).service.runScript(name, args, {
        refresh: opts.refresh,
        cwd: process.cwd(),
      });
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });

  program
    .command("delete")
    .description("Remove a script here and from GitHub")
    .argument("<name>", "Script name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      const ctx = load(command);
      await ctx.service.deleteScript(name);
      console.log(`Deleted ${name}`);
      printSyncResult(await runSync(ctx, "push", [name]));
    });
}

// =============================================================================
// HELPERS
// =============================================================================

function withPublishOptions(command: Command): Command {
  return command
    .option("-d, --description <text>", "One-line description for the header")
    .option("-t, --tag <tag>", "Tag to attach (repeatable)", collect, [])
    .option("--force", "Replace a script with the same name", false)
    .option("--local", "Keep the script local; skip the push", false);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function publishUnlessLocal(ctx: CliContext, local: boolean): Promise<void> {
  if (local) {
    console.log("Kept local. Run `script-inventory push` to publish it.");
    return;
  }
  printSyncResult(await runSync(ctx, "push"));
}

function stubScript(name: string): string {
  return [
    "def main() -> None:",
    `    print(${JSON.stringify(`Hello from ${name}!`)})`,
    "",
    "",
    'if __name__ == "__main__":',
    "    main()",
    "",
  ].join("\n");
}

function printScriptTable(entries: ScriptEntry[], descriptions?: Map<string, string>): void {
  if (entries.length === 0) {
    console.log("No scripts in the inventory.");
    return;
  }

  const header = ["Name", "Status", "Updated", "Tags"];
  if (descriptions) header.push("Description");

  const rows = entries.map((entry) => {
    const row = [
      entry.script_name,
      entry.document_id ? "published" : "local",
      entry.updated_at,
      entry.tags.join(", ") || "-",
    ];
    if (descriptions) row.push(descriptions.get(entry.script_name) ?? "-");
    return row;
  });

  // Every column but the last is padded to its widest cell.
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column].length)),
  );
  const format = (row: string[]): string =>
    row.map((cell, column) => (column === row.length - 1 ? cell : pad(cell, widths[column]))).join("  ");

  console.log(format(header));
  for (const row of rows) {
    console.log(format(row));
  }
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}

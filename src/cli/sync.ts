import type { Command } from "commander";

import type { SyncMode } from "../sync/reconcile.js";
import type { SyncResult } from "../sync/engine.js";

import type { CliContext, CliContextLoader, GlobalOptions } from "./config.js";
import { withSyncAbort } from "./signal-handlers.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

const SYNC_COMMANDS: Array<{ mode: SyncMode; description: string }> = [
  { mode: "sync", description: "Merge local and remote inventories both ways" },
  { mode: "push", description: "Publish local changes to the mapping gist" },
  { mode: "pull", description: "Bring remote changes into the local inventory" },
];

export function registerSyncCommands(program: Command, loader: CliContextLoader): void {
  for (const { mode, description } of SYNC_COMMANDS) {
    program
      .command(mode)
      .description(description)
      .action(async (_opts: unknown, command: Command) => {
        const ctx = loader.context(command.optsWithGlobals<GlobalOptions>());
        printSyncResult(await runSync(ctx, mode));
      });
  }

  program
    .command("adopt")
    .description("Use a specific mapping gist when several were found")
    .argument("<document-id>", "Gist id of the mapping document")
    .action(async (documentId: string, _opts: unknown, command: Command) => {
      const ctx = loader.context(command.optsWithGlobals<GlobalOptions>());
      const mapping = await ctx.service.adopt(documentId);
      console.log(
        `Adopted mapping gist ${mapping.documentId} (${Object.keys(mapping.entries).length} scripts).`,
      );
      console.log("Run `script-inventory sync` to merge it with the local inventory.");
    });

  program
    .command("status")
    .description("Show the local inventory state")
    .action(async (_opts: unknown, command: Command) => {
      const ctx = loader.context(command.optsWithGlobals<GlobalOptions>());
      const status = await ctx.service.status();

      console.log(`Owner: ${ctx.config.owner}`);
      console.log(`Mapping gist: ${status.pointer?.document_id ?? "(none yet)"}`);
      console.log(`Revision: ${status.record.revision ?? "-"}`);
      console.log(`Last synced: ${status.record.lastSyncedAt ?? "never"}`);
      console.log(`Scripts: ${status.published.length} published, ${status.drafts.length} local only`);
      for (const name of status.drafts) {
        console.log(`  - ${name} (not yet published)`);
      }
    });
}

// =============================================================================
// HELPERS
// =============================================================================

export async function runSync(
  ctx: CliContext,
  mode: SyncMode,
  removals?: string[],
): Promise<SyncResult> {
  return withSyncAbort(
    (signal) => ctx.service.sync({ mode, removals, signal }),
    (signal) => console.log(`Received ${signal}. Stopping ${mode} before the next step.`),
  );
}

export function printSyncResult(result: SyncResult): void {
  if (!result.pointer) {
    console.log("No mapping gist found; nothing to pull.");
    return;
  }

  const scripts = Object.keys(result.record.entries).length;
  const mapping = result.pushed ? "updated" : "unchanged";
  console.log(
    `${capitalize(result.mode)} complete: ${scripts} script(s), ${result.published.length} newly published, mapping ${mapping}.`,
  );
  for (const name of result.published) {
    console.log(`  + ${name} -> ${result.record.entries[name]?.document_id ?? "?"}`);
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

import {
  createAnsiFormatter,
  formatErrorLines,
  printErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";
import { exitCodeFor } from "./core/error-mapping.js";
import type { CliContextLoader, GlobalOptions } from "./cli/config.js";
import { buildCli } from "./cli/index.js";

export async function main(argv: string[] = process.argv, loader?: CliContextLoader): Promise<void> {
  const program = buildCli({ loader });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const globals = program.opts<GlobalOptions>();
    const lines = formatErrorLines(err, { mode: globals.debug ? "debug" : "short" });
    const color = resolveColorEnabled({ useColor: globals.color === false ? false : undefined });
    printErrorLines(lines, createAnsiFormatter(color));
    process.exitCode = exitCodeFor(err);
  }
}

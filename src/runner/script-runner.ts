import { execa } from "execa";

import { InventoryError } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import type { DependencyHeader } from "../metadata/header.js";

export type ScriptRunRequest = {
  scriptName: string;
  scriptPath: string;
  header: DependencyHeader;
  /** Passed through untouched, in order. */
  args: string[];
  cwd?: string;
};

export interface ScriptRunner {
  run(request: ScriptRunRequest): Promise<number>;
}

export class ScriptRunnerError extends InventoryError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ScriptRunnerError";
  }
}

export type UvScriptRunnerOptions = {
  /** Executable that understands `run <path> <args...>`. */
  command?: string;
  logger?: EventLogger;
};

/** Runs scripts through `uv run`, which resolves the inline dependency header itself. */
export class UvScriptRunner implements ScriptRunner {
  private readonly command: string;

  constructor(private readonly options: UvScriptRunnerOptions = {}) {
    this.command = options.command ?? "uv";
  }

  async run(request: ScriptRunRequest): Promise<number> {
    const args = ["run", request.scriptPath, ...request.args];
    this.options.logger?.log({
      type: "script.run.start",
      payload: {
        script: request.scriptName,
        command: this.command,
        dependencies: request.header.dependencies.length,
        args: request.args.length,
      },
    });

    const result = await execa(this.command, args, {
      cwd: request.cwd,
      stdio: "inherit",
      reject: false,
    });

    if (result.failed && result.exitCode === undefined) {
      throw new ScriptRunnerError(`Could not start "${this.command}". Is it installed and on PATH?`, result);
    }

    const exitCode = result.exitCode ?? 1;
    this.options.logger?.log({
      type: "script.run.complete",
      level: exitCode === 0 ? "info" : "warn",
      payload: { script: request.scriptName, exit_code: exitCode },
    });
    return exitCode;
  }
}

import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { MemoryLogger } from "../core/logger.js";
import { createHeader } from "../metadata/header.js";

import { ScriptRunnerError, UvScriptRunner } from "./script-runner.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

afterEach(() => {
  execaMock.mockReset();
});

describe("UvScriptRunner", () => {
  it("passes arguments through untouched and returns the exit code", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 3, failed: true } as Awaited<ReturnType<typeof execa>>);
    const logger = new MemoryLogger();
    const runner = new UvScriptRunner({ logger });

    const exitCode = await runner.run({
      scriptName: "weather",
      scriptPath: "/inventory/scripts/weather.py",
      header: createHeader({ dependencies: ["requests"] }),
      args: ["--city", "Oslo Centre", "-v", ""],
    });

    expect(exitCode).toBe(3);
    expect(execaMock).toHaveBeenCalledWith(
      "uv",
      ["run", "/inventory/scripts/weather.py", "--city", "Oslo Centre", "-v", ""],
      { cwd: undefined, stdio: "inherit", reject: false },
    );
    expect(logger.ofType("script.run.complete")[0]?.payload).toEqual({
      script: "weather",
      exit_code: 3,
    });
  });

  it("uses the configured command", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 0, failed: false } as Awaited<ReturnType<typeof execa>>);
    const runner = new UvScriptRunner({ command: "/opt/uv/bin/uv" });

    await runner.run({ scriptName: "x", scriptPath: "/tmp/x.py", header: createHeader(), args: [] });

    expect(execaMock.mock.calls[0]?.[0]).toBe("/opt/uv/bin/uv");
  });

  it("reports a runner that could not be started", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: undefined, failed: true } as Awaited<
      ReturnType<typeof execa>
    >);
    const runner = new UvScriptRunner();

    await expect(
      runner.run({ scriptName: "x", scriptPath: "/tmp/x.py", header: createHeader(), args: [] }),
    ).rejects.toBeInstanceOf(ScriptRunnerError);
  });
});

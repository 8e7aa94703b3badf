import os from "node:os";
import path from "node:path";

export const HOME_ENV_VAR = "SCRIPT_INVENTORY_HOME";
const DEFAULT_HOME_DIR = ".script-inventory";

export type InventoryPaths = {
  root: string;
  configFile: string;
  mappingFile: string;
  pointerFile: string;
  scriptsDir: string;
  lockFile: string;
  logsDir: string;
};

export function resolveInventoryRoot(explicit?: string): string {
  if (explicit) return path.resolve(explicit);

  const fromEnv = process.env[HOME_ENV_VAR]?.trim();
  if (fromEnv) return path.resolve(fromEnv);

  return path.join(os.homedir(), DEFAULT_HOME_DIR);
}

export function createInventoryPaths(root: string): InventoryPaths {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    configFile: path.join(resolved, "config.yaml"),
    mappingFile: path.join(resolved, "mapping.json"),
    pointerFile: path.join(resolved, "pointer.json"),
    scriptsDir: path.join(resolved, "scripts"),
    lockFile: path.join(resolved, "sync.lock"),
    logsDir: path.join(resolved, "logs"),
  };
}

export function eventLogPath(paths: InventoryPaths): string {
  return path.join(paths.logsDir, "events.jsonl");
}

export function scriptCachePath(paths: InventoryPaths, scriptName: string): string {
  return path.join(paths.scriptsDir, scriptFileName(scriptName));
}

export function scriptFileName(scriptName: string): string {
  return `${scriptName}.py`;
}

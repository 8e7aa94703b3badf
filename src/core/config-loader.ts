import fs from "node:fs";
import path from "node:path";

import { parse, stringify } from "yaml";
import type { ZodIssue } from "zod";

import { ConfigSchema, type InventoryConfig } from "./config.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// LOADING
// =============================================================================

export function loadInventoryConfig(configPath: string): InventoryConfig {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Inventory config missing.",
      message: `No config found at ${resolved}.`,
      hint: "Run `script-inventory init --owner <github-login>` to create one.",
    });
  }

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Inventory config unreadable.",
      message: `Could not parse ${resolved} as YAML.`,
      hint: "Fix the YAML syntax or re-run init with --force.",
      cause: err,
    });
  }

  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Inventory config invalid.",
      message: `Invalid config at ${resolved}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      hint: "Edit the listed keys in config.yaml.",
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

// =============================================================================
// INIT
// =============================================================================

export type InitConfigResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function initInventoryConfig(args: {
  configPath: string;
  owner: string;
  force?: boolean;
}): InitConfigResult {
  const exists = fs.existsSync(args.configPath);
  const force = args.force ?? false;

  if (exists && !force) {
    return { configPath: args.configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(args.configPath), { recursive: true });
  fs.writeFileSync(args.configPath, buildDefaultConfig(args.owner), "utf8");
  return { configPath: args.configPath, status: exists ? "overwritten" : "created" };
}

export function buildDefaultConfig(owner: string): string {
  const defaults = ConfigSchema.parse({ owner });
  return ["# script-inventory config. Update as needed.", stringify(defaults)].join("\n");
}

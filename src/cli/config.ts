import type { InventoryConfig } from "../core/config.js";
import { loadInventoryConfig } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import {
  createInventoryPaths,
  eventLogPath,
  resolveInventoryRoot,
  type InventoryPaths,
} from "../core/paths.js";
import { ScriptGenerator } from "../generate/script-generator.js";
import { SyncLock } from "../inventory/lock.js";
import { LocalInventoryStore } from "../inventory/store.js";
import { OpenAiClient } from "../llm/openai.js";
import { GistClient } from "../remote/gist-client.js";
import { RetryingDocumentClient } from "../remote/retrying-client.js";
import { UvScriptRunner } from "../runner/script-runner.js";
import { ScriptService } from "../scripts/service.js";
import { SyncEngine } from "../sync/engine.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalOptions = {
  home?: string;
  debug?: boolean;
  color?: boolean;
};

export type CliContext = {
  paths: InventoryPaths;
  config: InventoryConfig;
  logger: EventLogger;
  service: ScriptService;
  createGenerator: () => ScriptGenerator;
};

export type CliContextLoader = {
  paths: (globals: GlobalOptions) => InventoryPaths;
  context: (globals: GlobalOptions) => CliContext;
};

// =============================================================================
// LOADING
// =============================================================================

export function resolveCliPaths(globals: GlobalOptions): InventoryPaths {
  return createInventoryPaths(resolveInventoryRoot(globals.home));
}

export function loadCliContext(
  globals: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): CliContext {
  const paths = resolveCliPaths(globals);
  const config = loadInventoryConfig(paths.configFile);
  const logger = new JsonlLogger(eventLogPath(paths));

  const tokenEnv = config.remote.token_env;
  const token = env[tokenEnv]?.trim();
  if (!token) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.auth,
      title: "GitHub token missing.",
      message: `Environment variable ${tokenEnv} is not set.`,
      hint: `Export a personal access token with the gist scope as ${tokenEnv}.`,
    });
  }

  const client = new RetryingDocumentClient(
    new GistClient({
      token,
      apiBaseUrl: config.remote.api_base_url,
      timeoutMs: config.remote.timeout_ms,
      logger,
    }),
    {
      policy: {
        attempts: config.retry.attempts,
        baseDelayMs: config.retry.base_delay_ms,
        maxDelayMs: config.retry.max_delay_ms,
      },
      logger,
    },
  );

  const store = new LocalInventoryStore(paths);
  const engine = new SyncEngine({
    store,
    client,
    lock: new SyncLock({
      lockPath: paths.lockFile,
      logger,
      staleAfterMs: config.lock.stale_after_ms,
    }),
    logger,
    owner: config.owner,
    privateDocuments: config.remote.private_documents,
  });

  const service = new ScriptService({
    store,
    client,
    engine,
    runner: new UvScriptRunner({ command: config.runner.command, logger }),
    logger,
    owner: config.owner,
  });

  const createGenerator = (): ScriptGenerator =>
    new ScriptGenerator(
      new OpenAiClient({
        model: config.generator.model,
        defaultTimeoutMs: config.generator.timeout_ms,
      }),
      logger,
    );

  return { paths, config, logger, service, createGenerator };
}

export const defaultContextLoader: CliContextLoader = {
  paths: resolveCliPaths,
  context: (globals) => loadCliContext(globals),
};

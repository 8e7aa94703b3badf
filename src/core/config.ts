import { z } from "zod";

export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_TIMEOUT_MS = 20_000;

export const RemoteConfigSchema = z
  .object({
    api_base_url: z.string().url().default(DEFAULT_API_BASE_URL),
    token_env: z.string().min(1).default("GITHUB_TOKEN"),
    timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    private_documents: z.boolean().default(true),
  })
  .strict();

export const RetryConfigSchema = z
  .object({
    attempts: z.number().int().min(1).max(10).default(3),
    base_delay_ms: z.number().int().nonnegative().default(500),
    max_delay_ms: z.number().int().nonnegative().default(8_000),
  })
  .strict();

export const LockConfigSchema = z
  .object({
    stale_after_ms: z.number().int().positive().default(10 * 60 * 1000),
  })
  .strict();

export const RunnerConfigSchema = z
  .object({
    command: z.string().min(1).default("uv"),
  })
  .strict();

export const GeneratorConfigSchema = z
  .object({
    provider: z.literal("openai").default("openai"),
    model: z.string().min(1).default("gpt-4o-mini"),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

export const ConfigSchema = z
  .object({
    owner: z.string().min(1),
    remote: RemoteConfigSchema.default({}),
    retry: RetryConfigSchema.default({}),
    lock: LockConfigSchema.default({}),
    runner: RunnerConfigSchema.default({}),
    generator: GeneratorConfigSchema.default({}),
  })
  .strict();

export type InventoryConfig = z.infer<typeof ConfigSchema>;
export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

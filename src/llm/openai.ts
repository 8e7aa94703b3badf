import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type { Response, ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";

import { sleep } from "../core/utils.js";

import { LlmError, type LlmClient, type LlmCompletionOptions, type LlmCompletionResult } from "./client.js";

export type OpenAiTransport = {
  create: (
    body: ResponseCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<Response>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  maxRetries?: number;
  transport?: OpenAiTransport;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_TEMPERATURE = 0.2;
const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature: number;
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly transport: OpenAiTransport;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature ?? DEFAULT_TEMPERATURE;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.sleep = options.sleep ?? sleep;

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new LlmError(
          "OpenAI API key is required. Set OPENAI_API_KEY or pass apiKey to OpenAiClient.",
        );
      }
      this.transport = createTransport({ apiKey, baseURL: options.baseURL });
    }
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const body: ResponseCreateParamsNonStreaming = {
      model: this.model,
      input: prompt,
      temperature: options.temperature ?? this.defaultTemperature,
    };
    const requestOptions: OpenAI.RequestOptions = {
      timeout: options.timeoutMs ?? this.defaultTimeoutMs,
    };

    const response = await this.runWithRetries(() => this.transport.create(body, requestOptions));
    const text = response.output_text ?? "";
    if (!text) {
      throw new LlmError("OpenAI response did not include assistant content.", response);
    }

    return { text, finishReason: response.status ?? null };
  }

  private async runWithRetries<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await fn();
      } catch (err) {
        if (!this.isRetryable(err) || attempt >= this.maxRetries) {
          throw this.wrapError(err);
        }
        await this.sleep(this.retryDelayMs(attempt));
      }
    }
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIError) {
      return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
    }
    if (error instanceof OpenAIError) {
      return "code" in error && error.code === "rate_limit_exceeded";
    }
    if (error instanceof Error) {
      return error.message.toLowerCase().includes("timeout") || error.message.includes("ETIMEDOUT");
    }
    return false;
  }

  private retryDelayMs(attempt: number): number {
    const capped = Math.min(attempt, 5);
    return 250 * 2 ** (capped - 1);
  }

  private wrapError(error: unknown): LlmError {
    if (error instanceof APIError) {
      const status = error.status ?? "unknown";
      const hint =
        status === 401 || status === 403
          ? " Check OPENAI_API_KEY and permissions."
          : status === 429
            ? " Rate limited by OpenAI."
            : "";
      return new LlmError(`OpenAI request failed (status ${status}): ${error.message}${hint}`, error);
    }
    if (error instanceof OpenAIError) {
      return new LlmError(`OpenAI request failed: ${error.message}`, error);
    }
    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }
    return new LlmError("OpenAI request failed due to an unknown error.", error);
  }
}

function createTransport(args: { apiKey: string; baseURL?: string }): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Manual retries handled in OpenAiClient.
  });

  return {
    create: (body, options) => client.responses.create({ ...body, stream: false }, options),
  };
}

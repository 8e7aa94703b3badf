import type OpenAI from "openai";
import { APIError as OpenAiApiError } from "openai/error";
import type { Response, ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";
import { describe, expect, it, vi } from "vitest";

import { LlmError } from "./client.js";
import { OpenAiClient } from "./openai.js";

class FakeOpenAiTransport {
  readonly bodies: ResponseCreateParamsNonStreaming[] = [];
  lastOptions?: OpenAI.RequestOptions;
  private readonly outcomes: Array<Response | Error>;

  constructor(...outcomes: Array<Response | Error>) {
    this.outcomes = outcomes;
  }

  async create(
    body: ResponseCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ): Promise<Response> {
    this.bodies.push(body);
    this.lastOptions = options;
    const outcome = this.outcomes.shift();
    if (!outcome) {
      throw new Error("no more fake outcomes");
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

function makeOpenAiResponse(content: string): Response {
  return {
    id: "resp_123",
    created_at: 1,
    output_text: content,
    status: "completed",
    model: "gpt-4o-mini",
    object: "response",
    output: [],
    error: null,
    incomplete_details: null,
    instructions: null,
    metadata: null,
    parallel_tool_calls: false,
    temperature: null,
    top_p: null,
    tool_choice: "auto",
    tools: [],
  } as Response;
}

describe("OpenAiClient", () => {
  it("sends the prompt with temperature and timeout overrides", async () => {
    const transport = new FakeOpenAiTransport(makeOpenAiResponse("print('hi')"));
    const client = new OpenAiClient({
      model: "gpt-4o-mini",
      transport,
      defaultTemperature: 0.7,
      defaultTimeoutMs: 30_000,
    });

    const result = await client.complete("Write a script", { temperature: 0.1, timeoutMs: 1_500 });

    expect(transport.bodies[0]).toEqual({ model: "gpt-4o-mini", input: "Write a script", temperature: 0.1 });
    expect(transport.lastOptions?.timeout).toBe(1_500);
    expect(result).toEqual({ text: "print('hi')", finishReason: "completed" });
  });

  it("falls back to the configured defaults", async () => {
    const transport = new FakeOpenAiTransport(makeOpenAiResponse("x"));
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport, defaultTemperature: 0.7 });

    await client.complete("Hi");

    expect(transport.bodies[0]?.temperature).toBe(0.7);
    expect(transport.lastOptions?.timeout).toBe(60_000);
  });

  it("retries retriable statuses before succeeding", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const transport = new FakeOpenAiTransport(
      new OpenAiApiError(503, { message: "overloaded" }, "Service Unavailable", undefined),
      makeOpenAiResponse("ok"),
    );
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport, sleep });

    const result = await client.complete("Hi");

    expect(result.text).toBe("ok");
    expect(transport.bodies).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("wraps OpenAI errors with actionable guidance", async () => {
    const apiError = new OpenAiApiError(401, { message: "Missing API key" }, "Unauthorized", undefined);
    const transport = new FakeOpenAiTransport(apiError);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport });
    const run = client.complete("Hi there");

    await expect(run).rejects.toBeInstanceOf(LlmError);
    await expect(run).rejects.toThrow(/status 401/i);
    await expect(run).rejects.toThrow(/OPENAI_API_KEY/);
  });

  it("rejects an empty completion", async () => {
    const transport = new FakeOpenAiTransport(makeOpenAiResponse(""));
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport });

    await expect(client.complete("Hi")).rejects.toThrow("did not include assistant content");
  });
});

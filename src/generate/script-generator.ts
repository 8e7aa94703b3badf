import { renderScriptPrompt } from "../core/prompts.js";
import type { EventLogger } from "../core/logger.js";
import { isoNow } from "../core/utils.js";
import type { LlmClient } from "../llm/client.js";
import { LlmError } from "../llm/client.js";
import { decodeScript, encodeScript, ensureHeader, type DependencyHeader } from "../metadata/header.js";

export const DEFAULT_GENERATED_TAGS = ["generated"];
const MAX_DESCRIPTION_LENGTH = 120;

export type GenerateScriptOptions = {
  tags?: string[];
  now?: Date;
};

export type GeneratedScript = {
  text: string;
  header: DependencyHeader;
};

export type RenderPrompt = typeof renderScriptPrompt;

export class ScriptGenerator {
  constructor(
    private readonly llm: LlmClient,
    private readonly logger?: EventLogger,
    private readonly renderPrompt: RenderPrompt = renderScriptPrompt,
  ) {}

  async generate(request: string, options: GenerateScriptOptions = {}): Promise<GeneratedScript> {
    const description = describeRequest(request);
    const prompt = await this.renderPrompt({
      request: request.trim(),
      descriptionLiteral: JSON.stringify(description),
    });

    const completion = await this.llm.complete(prompt);
    const body = stripCodeFence(completion.text);
    const defaults = {
      description,
      tags: options.tags && options.tags.length > 0 ? options.tags : DEFAULT_GENERATED_TAGS,
      createdDate: isoNow(options.now).slice(0, 10),
    };

    const ensured = ensureHeader(body, defaults);
    if (ensured.problem) {
      throw new LlmError(`Generated script has a malformed metadata header: ${ensured.problem}`);
    }

    let { text, header } = ensured;
    if (!ensured.attached) {
      // The model wrote its own header; fill what it left out.
      header = {
        ...header,
        description: header.description ?? defaults.description,
        tags: header.tags.length > 0 ? header.tags : [...defaults.tags],
        createdDate: header.createdDate ?? defaults.createdDate,
      };
      text = encodeScript(header, decodeScript(text).body);
    }

    this.logger?.log({
      type: "script.generated",
      payload: {
        finish_reason: completion.finishReason,
        header_attached: ensured.attached,
        dependencies: header.dependencies.length,
      },
    });
    return { text, header };
  }
}

/** First sentence of the request, capped for use as a one-line description. */
export function describeRequest(request: string): string {
  const flattened = request.replace(/\s+/g, " ").trim();
  const match = /^(.+?[.!?])(\s|$)/.exec(flattened);
  const sentence = (match ? match[1] : flattened).trim();
  if (sentence.length <= MAX_DESCRIPTION_LENGTH) {
    return sentence;
  }
  return `${sentence.slice(0, MAX_DESCRIPTION_LENGTH - 3).trimEnd()}...`;
}

/** Removes one surrounding ``` fence (with or without a language tag). */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = /^```[\w+-]*[ \t]*\n([\s\S]*?)\n?```$/.exec(trimmed);
  const inner = match ? match[1] : trimmed;
  return inner.endsWith("\n") ? inner : `${inner}\n`;
}

import { InventoryError } from "../core/errors.js";

export type LlmCompletionOptions = {
  temperature?: number;
  timeoutMs?: number;
};

export type LlmCompletionResult = {
  text: string;
  finishReason: string | null;
};

export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

export class LlmError extends InventoryError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmError";
  }
}

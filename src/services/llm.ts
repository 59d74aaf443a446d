// src/services/llm.ts
import OpenAI from "openai";
import { ConfigurationError, UpstreamError, errorMessage } from "../errors";

export type LlmConfig = {
  apiKey?: string;
  /** OpenAI-compatible endpoint; Gemini serves one under /v1beta/openai/. */
  baseURL: string;
  model: string;
};

/** Anything that turns a prompt into model text. The pipeline only sees this. */
export interface TextGenerator {
  readonly defaultModel: string;
  generate(prompt: string, model?: string): Promise<string>;
}

/**
 * One chat-completion call per `generate`, through the openai SDK pointed at Gemini.
 * SDK retries are off: a failure surfaces on the first attempt.
 */
export class GeminiClient implements TextGenerator {
  private client: OpenAI | null = null;

  constructor(private readonly config: LlmConfig) {}

  get defaultModel(): string {
    return this.config.model;
  }

  private getClient(): OpenAI {
    const key = this.config.apiKey?.trim();
    if (!key) {
      throw new ConfigurationError(
        "GEMINI_API_KEY is not set.",
        "Add it to the environment or to .env and restart the server."
      );
    }
    if (!this.client) {
      this.client = new OpenAI({ apiKey: key, baseURL: this.config.baseURL, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(prompt: string, model = this.config.model): Promise<string> {
    const client = this.getClient();

    let content: string | null | undefined;
    try {
      const resp = await client.chat.completions.create({
        model,
        messages: [{ role: "user", content: prompt }],
      });
      content = resp.choices[0]?.message?.content;
    } catch (err) {
      console.error("[llm] model call failed:", { model, error: errorMessage(err) });
      throw new UpstreamError(`Model call failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!content || !content.trim()) {
      throw new UpstreamError(`Model ${model} returned an empty response`);
    }
    console.log("[llm] response (200 chars):", content.slice(0, 200));
    return content;
  }
}

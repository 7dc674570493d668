import OpenAI from "openai";
import type { LlmProvider } from "../types";
import { LlmError, errorMessage } from "../utils/errors";
import { PROVIDER_LABELS, type SummaryClient } from "./providers";

export interface OpenAICompatibleOptions {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  systemPrompt: string;
  baseURL?: string;
  temperature?: number;
  logResponses?: boolean;
}

/**
 * Chat completions client for OpenAI and OpenAI-compatible endpoints (ZhipuAI)
 */
export class OpenAICompatibleClient implements SummaryClient {
  readonly provider: LlmProvider;
  readonly model: string;
  private client: OpenAI;
  private options: OpenAICompatibleOptions;

  constructor(options: OpenAICompatibleOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.options = options;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async *streamSummary(prompt: string): AsyncGenerator<string> {
    let text = "";

    try {
      const stream = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: this.options.systemPrompt },
          { role: "user", content: prompt },
        ],
        stream: true,
        temperature: this.options.temperature,
      });

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          text += delta;
          yield delta;
        }
      }
    } catch (error) {
      throw new LlmError(
        `Error calling ${PROVIDER_LABELS[this.provider]} API: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (this.options.logResponses) {
      console.log(`\n[DEBUG] ${PROVIDER_LABELS[this.provider]} Summary Response:`, text);
    }
  }
}

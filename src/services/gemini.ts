import { GoogleGenAI } from "@google/genai";
import { LlmError, errorMessage } from "../utils/errors";
import type { SummaryClient } from "./providers";

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  systemPrompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  logResponses?: boolean;
}

export class GeminiClient implements SummaryClient {
  readonly provider = "gemini" as const;
  readonly model: string;
  private ai: GoogleGenAI;
  private options: GeminiClientOptions;

  constructor(options: GeminiClientOptions) {
    this.model = options.model;
    this.options = options;
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  /**
   * Streams the summary text as Gemini produces it
   */
  async *streamSummary(prompt: string): AsyncGenerator<string> {
    let text = "";

    try {
      const stream = await this.ai.models.generateContentStream({
        model: this.model,
        contents: prompt,
        config: {
          systemInstruction: this.options.systemPrompt,
          temperature: this.options.temperature,
          maxOutputTokens: this.options.maxOutputTokens,
        },
      });

      for await (const chunk of stream) {
        const delta = chunk.text;
        if (delta) {
          text += delta;
          yield delta;
        }
      }
    } catch (error) {
      throw new LlmError(`Error calling Gemini API: ${errorMessage(error)}`, { cause: error });
    }

    if (this.options.logResponses) {
      console.log("\n[DEBUG] Gemini Summary Response:", text);
    }
  }
}

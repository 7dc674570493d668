import type { LlmProvider } from "../types";
import { LlmError } from "../utils/errors";
import { GeminiClient } from "./gemini";
import { OpenAICompatibleClient } from "./openai";
import {
  ADVISOR_SYSTEM_PROMPT,
  DEFAULT_MODELS,
  ENGINEER_SYSTEM_PROMPT,
  PROVIDER_LABELS,
  ZHIPUAI_BASE_URL,
  type SummaryClient,
} from "./providers";

export type { SummaryClient } from "./providers";

export interface SummaryClientOptions {
  model?: string | null;
  logResponses?: boolean;
}

export function createSummaryClient(
  provider: LlmProvider,
  apiKey: string,
  options: SummaryClientOptions = {},
): SummaryClient {
  if (!apiKey.trim()) {
    throw new LlmError(`Missing ${PROVIDER_LABELS[provider]} API key`);
  }

  const model = options.model || DEFAULT_MODELS[provider];
  const logResponses = options.logResponses ?? false;

  switch (provider) {
    case "openai":
      return new OpenAICompatibleClient({
        provider,
        apiKey,
        model,
        systemPrompt: ENGINEER_SYSTEM_PROMPT,
        temperature: 0,
        logResponses,
      });
    case "zhipuai":
      return new OpenAICompatibleClient({
        provider,
        apiKey,
        model,
        baseURL: ZHIPUAI_BASE_URL,
        systemPrompt: ADVISOR_SYSTEM_PROMPT,
        logResponses,
      });
    case "gemini":
      return new GeminiClient({
        apiKey,
        model,
        systemPrompt: ENGINEER_SYSTEM_PROMPT,
        temperature: 0,
        logResponses,
      });
  }
}

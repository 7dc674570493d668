import type { LlmProvider } from "../types";

export const ENGINEER_SYSTEM_PROMPT = "You are a seasoned software engineer.";
export const ADVISOR_SYSTEM_PROMPT =
  "You are a knowledgeable assistant that provides professional and insightful advice.";

export const ZHIPUAI_BASE_URL = "https://open.bigmodel.cn/api/paas/v4/";

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: "gpt-4o",
  zhipuai: "glm-4-flash",
  gemini: "gemini-2.5-flash",
};

export const PROVIDER_LABELS: Record<LlmProvider, string> = {
  openai: "OpenAI",
  zhipuai: "ZhipuAI",
  gemini: "Gemini",
};

/**
 * A chat model that turns a prompt into a stream of text deltas
 */
export interface SummaryClient {
  readonly provider: LlmProvider;
  readonly model: string;
  streamSummary(prompt: string): AsyncIterable<string>;
}

export const API_KEY_ENV: Record<LlmProvider, string> = {
  openai: "OPENAI_API_KEY",
  zhipuai: "ZHIPUAI_API_KEY",
  gemini: "GEMINI_API_KEY",
};

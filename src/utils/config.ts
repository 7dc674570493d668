import "dotenv/config";
import {
  LLM_PROVIDERS,
  MAX_DAYS,
  MIN_DAYS,
  OUTPUT_LANGUAGES,
  type LlmProvider,
  type OutputLanguage,
} from "../types";
import { ValidationError } from "./errors";

export interface Config {
  // Credentials
  githubToken: string | null;
  openaiApiKey: string | null;
  zhipuaiApiKey: string | null;
  geminiApiKey: string | null;

  // LLM settings
  llmProvider: LlmProvider; // 기본 provider (기본: openai)
  llmModel: string | null; // 모델 override (없으면 provider 기본값)
  maxPromptChars: number; // 프롬프트 하나에 담을 릴리스 JSON 최대 길이 (기본: 60000)

  // Summary defaults
  defaultDays: number; // 추적 기간 (기본: 7)
  defaultLanguage: OutputLanguage; // 출력 언어 (기본: English)

  // Storage
  reposFile: string; // 저장소 목록 파일 (기본: data/repos.json)

  // GitHub fetching
  githubConcurrency: number; // 동시 요청 수 (기본: 4)
  githubTimeoutMs: number; // 요청 타임아웃 ms (기본: 15000)

  // Retry settings
  maxRetries: number; // 최대 재시도 횟수 (기본: 3)
  retryDelay: number; // 재시도 간 딜레이 ms (기본: 1000)

  // Server
  apiPort: number; // HTTP 서버 포트 (기본: 3001)

  // Debug settings
  debug: boolean; // 디버그 모드 (기본: false)
  logApiResponses: boolean; // API 응답 로깅 (기본: false)
}

function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function optionalEnv(key: string): string | null {
  const value = process.env[key]?.trim();
  return value ? value : null;
}

export function parseProvider(value: string): LlmProvider {
  const normalized = value.trim().toLowerCase();
  const provider = LLM_PROVIDERS.find((p) => p === normalized);
  if (!provider) {
    throw new ValidationError(
      `Unsupported LLM provider: ${value} (expected one of ${LLM_PROVIDERS.join(", ")})`,
    );
  }
  return provider;
}

export function parseLanguage(value: string): OutputLanguage {
  const language = OUTPUT_LANGUAGES.find((l) => l === value.trim());
  if (!language) {
    throw new ValidationError(
      `Unsupported output language: ${value} (expected one of ${OUTPUT_LANGUAGES.join(", ")})`,
    );
  }
  return language;
}

/**
 * Validates a tracking window given as a number or a string from argv/JSON
 */
export function parseDays(value: unknown): number {
  const days = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof days !== "number" || !Number.isInteger(days) || days < MIN_DAYS || days > MAX_DAYS) {
    throw new ValidationError(
      `Number of days must be an integer between ${MIN_DAYS} and ${MAX_DAYS}`,
    );
  }
  return days;
}

export function loadConfig(): Config {
  return {
    githubToken: optionalEnv("GITHUB_TOKEN"),
    openaiApiKey: optionalEnv("OPENAI_API_KEY"),
    zhipuaiApiKey: optionalEnv("ZHIPUAI_API_KEY"),
    geminiApiKey: optionalEnv("GEMINI_API_KEY"),

    llmProvider: parseProvider(process.env.LLM_PROVIDER || "openai"),
    llmModel: optionalEnv("LLM_MODEL"),
    maxPromptChars: parseIntEnv("MAX_PROMPT_CHARS", 60000),

    defaultDays: parseDays(parseIntEnv("DEFAULT_DAYS", 7)),
    defaultLanguage: parseLanguage(process.env.DEFAULT_LANGUAGE || "English"),

    reposFile: process.env.REPOS_FILE || "data/repos.json",

    githubConcurrency: parseIntEnv("GITHUB_CONCURRENCY", 4),
    githubTimeoutMs: parseIntEnv("GITHUB_TIMEOUT_MS", 15000),

    maxRetries: parseIntEnv("MAX_RETRIES", 3),
    retryDelay: parseIntEnv("RETRY_DELAY", 1000),

    apiPort: parseIntEnv("API_PORT", 3001),

    debug: parseBoolEnv("DEBUG", false),
    logApiResponses: parseBoolEnv("LOG_API_RESPONSES", false),
  };
}

/**
 * API key configured in the environment for a provider
 */
export function apiKeyFor(config: Config, provider: LlmProvider): string | null {
  switch (provider) {
    case "openai":
      return config.openaiApiKey;
    case "zhipuai":
      return config.zhipuaiApiKey;
    case "gemini":
      return config.geminiApiKey;
  }
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

export interface RepoRef {
  owner: string;
  name: string;
}

export interface ReleaseEntry {
  time: string;
  version: string;
  name: string | null;
  description: string | null;
  prerelease: boolean;
  url: string;
}

export type LlmProvider = "openai" | "zhipuai" | "gemini";

export const LLM_PROVIDERS: readonly LlmProvider[] = ["openai", "zhipuai", "gemini"];

export const OUTPUT_LANGUAGES = [
  "English",
  "繁體中文zh-tw",
  "簡體中文zh-cn",
  "Spanish",
  "French",
  "German",
] as const;

export type OutputLanguage = (typeof OUTPUT_LANGUAGES)[number];

export const MIN_DAYS = 1;
export const MAX_DAYS = 365;

export type DigestEvent =
  | { type: "fetched"; repo: string; releases: ReleaseEntry[] }
  | { type: "skipped"; repo: string; reason: string }
  | { type: "chunk"; repo: string; part: number; text: string }
  | { type: "done"; repo: string; summary: string; releaseCount: number }
  | { type: "failed"; repo: string; message: string };

export interface RepoDigest {
  repo: string;
  status: "done" | "skipped" | "failed";
  summary: string;
  releaseCount: number;
  message?: string;
}

export interface StoreResult {
  ok: boolean;
  message: string;
}

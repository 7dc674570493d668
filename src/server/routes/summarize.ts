/**
 * 릴리스 요약 라우터
 */
import { Router, type IRouter, type NextFunction, type Request, type Response } from "express";
import type { SummaryClientOptions } from "../../services/llm";
import { API_KEY_ENV, PROVIDER_LABELS, type SummaryClient } from "../../services/providers";
import { summarizeRepositories, type FetchReleases } from "../../services/summarizer";
import type { LlmProvider } from "../../types";
import { apiKeyFor, parseDays, parseLanguage, parseProvider, type Config } from "../../utils/config";
import { ValidationError, errorMessage } from "../../utils/errors";
import type { RepoStore } from "../../utils/repo-storage";
import { sessionIdOf } from "../session";

export type CreateClient = (
  provider: LlmProvider,
  apiKey: string,
  options: SummaryClientOptions,
) => SummaryClient;

export interface SummarizeRouterDeps {
  config: Config;
  store: RepoStore;
  createClient: CreateClient;
  fetchReleases: FetchReleases;
}

interface SummarizeRequest {
  days: number;
  language: string;
  provider: LlmProvider;
  model: string | null;
  apiKey: string;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

function parseSummarizeRequest(body: unknown, config: Config): SummarizeRequest {
  const fields: Record<string, unknown> =
    typeof body === "object" && body !== null ? { ...body } : {};

  const provider = parseProvider(optionalString(fields.provider, "provider") ?? config.llmProvider);
  const apiKey = optionalString(fields.apiKey, "apiKey")?.trim() || apiKeyFor(config, provider);
  if (!apiKey) {
    throw new ValidationError(
      `Missing ${PROVIDER_LABELS[provider]} API key. Provide apiKey or set ${API_KEY_ENV[provider]}.`,
    );
  }

  return {
    days: parseDays(fields.days ?? config.defaultDays),
    language: parseLanguage(optionalString(fields.language, "language") ?? config.defaultLanguage),
    provider,
    model: optionalString(fields.model, "model") ?? config.llmModel,
    apiKey,
  };
}

export function createSummarizeRouter(deps: SummarizeRouterDeps): IRouter {
  const router: IRouter = Router();

  /**
   * POST /api/summarize
   * 세션의 저장소 목록을 요약하여 NDJSON 이벤트 스트림으로 응답
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = sessionIdOf(res);
      const request = parseSummarizeRequest(req.body, deps.config);

      const repos = deps.store.read(sessionId);
      if (repos.length === 0) {
        res.status(400).json({ error: "No repositories saved." });
        return;
      }

      let client: SummaryClient;
      try {
        client = deps.createClient(request.provider, request.apiKey, {
          model: request.model,
          logResponses: deps.config.logApiResponses,
        });
      } catch (error) {
        res.status(400).json({ error: `Error creating LLM client: ${errorMessage(error)}` });
        return;
      }

      let closed = false;
      res.on("close", () => {
        closed = true;
      });

      res.status(200);
      res.setHeader("Content-Type", "application/x-ndjson; charset=utf-8");
      res.setHeader("Cache-Control", "no-cache");

      const events = summarizeRepositories(
        repos,
        {
          days: request.days,
          language: request.language,
          maxPromptChars: deps.config.maxPromptChars,
          concurrency: deps.config.githubConcurrency,
        },
        { client, fetchReleases: deps.fetchReleases },
      );

      for await (const event of events) {
        if (closed) break;
        res.write(JSON.stringify(event) + "\n");
      }
      res.end();
    } catch (error) {
      if (res.headersSent) {
        console.error("❌ 요약 스트림 오류:", errorMessage(error));
        res.end();
        return;
      }
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message });
        return;
      }
      res.removeHeader("Content-Type");
      res.removeHeader("Cache-Control");
      next(error);
    }
  });

  return router;
}

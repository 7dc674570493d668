/**
 * Express API 서버
 * 브라우저 프론트엔드에 저장소 관리와 릴리스 요약 API를 제공
 */
import { fileURLToPath } from "url";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { getRecentReleases } from "../api";
import { createSummaryClient } from "../services/llm";
import type { FetchReleases } from "../services/summarizer";
import type { Config } from "../utils/config";
import type { RepoStore } from "../utils/repo-storage";
import { createHealthRouter } from "./routes/health";
import { createReposRouter } from "./routes/repos";
import { createSummarizeRouter, type CreateClient } from "./routes/summarize";
import { sessionMiddleware } from "./session";

export const PUBLIC_DIR = fileURLToPath(new URL("../../public", import.meta.url));

export interface AppDeps {
  config: Config;
  store: RepoStore;
  createClient?: CreateClient;
  fetchReleases?: FetchReleases;
  publicDir?: string;
  logRequests?: boolean;
}

export function createApp(deps: AppDeps): Express {
  const { config, store } = deps;
  const createClient = deps.createClient ?? createSummaryClient;
  const fetchReleases: FetchReleases =
    deps.fetchReleases ??
    ((ref, days) =>
      getRecentReleases(ref, days, {
        token: config.githubToken,
        timeoutMs: config.githubTimeoutMs,
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelay,
      }));

  const app: Express = express();

  app.use(express.json());

  // 요청 로깅
  if (deps.logRequests ?? true) {
    app.use((req, _res, next) => {
      console.log(`📨 ${req.method} ${req.path}`);
      next();
    });
  }

  app.use(express.static(deps.publicDir ?? PUBLIC_DIR));

  // 라우터 등록
  app.use("/api/health", createHealthRouter());
  app.use("/api/repos", sessionMiddleware, createReposRouter(store));
  app.use(
    "/api/summarize",
    sessionMiddleware,
    createSummarizeRouter({ config, store, createClient, fetchReleases }),
  );

  // 404 핸들러
  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found" });
  });

  // 에러 핸들러
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("❌ 서버 오류:", err.message);
    res.status(500).json({ error: "Internal Server Error", message: err.message });
  });

  return app;
}

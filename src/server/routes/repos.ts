/**
 * 저장소 목록 라우터
 */
import { Router, type IRouter, type Request, type Response } from "express";
import type { RepoStore } from "../../utils/repo-storage";
import { sessionIdOf } from "../session";

export function createReposRouter(store: RepoStore): IRouter {
  const router: IRouter = Router();

  /**
   * GET /api/repos
   */
  router.get("/", (_req: Request, res: Response) => {
    const sessionId = sessionIdOf(res);
    res.json({ sessionId, repos: store.read(sessionId) });
  });

  /**
   * POST /api/repos
   * body: { repo: "owner/name" | "https://github.com/owner/name" }
   */
  router.post("/", (req: Request, res: Response) => {
    const sessionId = sessionIdOf(res);
    const repo: unknown = req.body?.repo;

    if (typeof repo !== "string" || !repo.trim()) {
      res.status(400).json({ error: "Please enter a repository." });
      return;
    }

    const result = store.add(sessionId, repo);
    if (!result.ok) {
      res.status(400).json({ error: result.message });
      return;
    }

    res.status(201).json({ message: result.message, repos: store.read(sessionId) });
  });

  /**
   * DELETE /api/repos/:owner/:name
   * name은 "/"를 포함할 수 있음 (owner/name/extra 형식도 저장 가능)
   */
  router.delete("/:owner/:name(*)", (req: Request, res: Response) => {
    const sessionId = sessionIdOf(res);
    const result = store.remove(sessionId, `${req.params.owner}/${req.params.name}`);

    if (!result.ok) {
      res.status(404).json({ error: result.message });
      return;
    }

    res.json({ message: result.message, repos: store.read(sessionId) });
  });

  return router;
}

import type { Server } from "http";
import type { Config } from "../utils/config";
import { RepoStore } from "../utils/repo-storage";
import { createApp } from "./app";

export function startServer(config: Config, port: number = config.apiPort): Server {
  const app = createApp({ config, store: new RepoStore(config.reposFile) });

  return app.listen(port, () => {
    console.log(`
🚀 Release Digest server is running!
━━━━━━━━━━━━━━━━━━━━━━━━━━━
📍 URL: http://localhost:${port}
📋 Endpoints:
   GET    /api/health                - Server status
   GET    /api/repos                 - Tracked repositories
   POST   /api/repos                 - Add a repository
   DELETE /api/repos/:owner/:name    - Remove a repository
   POST   /api/summarize             - Stream release summaries
━━━━━━━━━━━━━━━━━━━━━━━━━━━
`);
  });
}

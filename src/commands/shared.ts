import type { Command } from "commander";
import type { Config } from "../utils/config";
import { errorMessage } from "../utils/errors";
import { RepoStore } from "../utils/repo-storage";

export const DEFAULT_PROFILE = "default";

/**
 * Profile selected through the global --profile option
 */
export function getProfile(command: Command): string {
  const { profile } = command.optsWithGlobals<{ profile?: string }>();
  return profile?.trim() || DEFAULT_PROFILE;
}

export function createStore(config: Config): RepoStore {
  return new RepoStore(config.reposFile);
}

export function exitWithError(error: unknown): never {
  console.error("\n❌ Error:", errorMessage(error));
  process.exit(1);
}

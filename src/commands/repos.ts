import { Command } from "commander";
import { confirm } from "@inquirer/prompts";
import { loadConfig } from "../utils/config";
import { formatRepo, parseRepoInput } from "../utils/repo-input";
import type { RepoStore } from "../utils/repo-storage";
import { createStore, exitWithError, getProfile } from "./shared";

interface ReposOptions {
  add?: string;
  remove?: string;
  clear?: boolean;
  yes?: boolean;
}

export const reposCommand = new Command("repos")
  .description("Manage the tracked repository list")
  .option("--add <repo>", "Add a repository (owner/repo or GitHub URL)")
  .option("--remove <repo>", "Remove a repository")
  .option("--clear", "Remove all repositories")
  .option("-y, --yes", "Skip confirmation prompts")
  .action(async (options: ReposOptions, command: Command) => {
    try {
      const config = loadConfig();
      const store = createStore(config);
      const profile = getProfile(command);

      if (options.add) {
        handleAdd(store, profile, options.add);
      } else if (options.remove) {
        await handleRemove(store, profile, options.remove, options.yes ?? false);
      } else if (options.clear) {
        await handleClear(store, profile, options.yes ?? false);
      } else {
        showRepos(store, profile);
      }
    } catch (error) {
      exitWithError(error);
    }
  });

function showRepos(store: RepoStore, profile: string) {
  const repos = store.read(profile);

  if (repos.length === 0) {
    console.log("\nNo repositories saved.");
    console.log("   Add one with: release-digest repos --add owner/repo");
    return;
  }

  console.log(`\n📋 ${repos.length} tracked repositories (profile: ${profile}):\n`);
  console.log("─".repeat(60));
  repos.forEach((repo, i) => {
    console.log(`${(i + 1).toString().padStart(2)}. ${repo}`);
  });
  console.log("─".repeat(60));
}

function handleAdd(store: RepoStore, profile: string, input: string) {
  const result = store.add(profile, input);
  if (result.ok) {
    console.log(`\n✅ ${result.message}`);
  } else {
    console.log(`\n⚠️ ${result.message}`);
    process.exitCode = 1;
  }
}

/**
 * Accepts the same spellings as --add, falling back to the literal entry
 */
function normalizeEntry(input: string): string {
  try {
    return formatRepo(parseRepoInput(input));
  } catch {
    return input.trim();
  }
}

async function handleRemove(store: RepoStore, profile: string, input: string, skipConfirm: boolean) {
  const repo = normalizeEntry(input);

  if (!store.read(profile).includes(repo)) {
    console.log(`\n⚠️ Repository not found: ${repo}`);
    process.exitCode = 1;
    return;
  }

  if (!skipConfirm) {
    const confirmed = await confirm({
      message: `Remove "${repo}" from the tracked list?`,
      default: false,
    });
    if (!confirmed) {
      console.log("Cancelled.");
      return;
    }
  }

  const result = store.remove(profile, repo);
  console.log(`\n${result.ok ? "✅" : "⚠️"} ${result.message}`);
}

async function handleClear(store: RepoStore, profile: string, skipConfirm: boolean) {
  const repos = store.read(profile);
  if (repos.length === 0) {
    console.log("\nNo repositories to remove.");
    return;
  }

  if (!skipConfirm) {
    const confirmed = await confirm({
      message: `Remove all ${repos.length} repositories?`,
      default: false,
    });
    if (!confirmed) {
      console.log("Cancelled.");
      return;
    }
  }

  const removed = store.clear(profile);
  console.log(`\n✅ ${removed} repositories removed.`);
}

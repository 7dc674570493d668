import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { StoreResult } from "../types";
import { RepoInputError } from "./errors";
import { formatRepo, parseRepoInput } from "./repo-input";

export type StoredRepos = Record<string, string[]>;

/**
 * Repository lists per profile, kept in a single JSON file
 */
export class RepoStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  read(profile: string): string[] {
    return this.load()[profile] ?? [];
  }

  add(profile: string, input: string): StoreResult {
    let repo: string;
    try {
      repo = formatRepo(parseRepoInput(input));
    } catch (error) {
      if (error instanceof RepoInputError) {
        return { ok: false, message: "Invalid repository format." };
      }
      throw error;
    }

    const data = this.load();
    const repos = data[profile] ?? [];
    if (repos.includes(repo)) {
      return { ok: false, message: "Repository already exists." };
    }

    data[profile] = [...repos, repo];
    this.save(data);
    return { ok: true, message: "Repository added." };
  }

  remove(profile: string, repo: string): StoreResult {
    const data = this.load();
    const repos = data[profile] ?? [];
    if (!repos.includes(repo)) {
      return { ok: false, message: "Repository not found." };
    }

    data[profile] = repos.filter((r) => r !== repo);
    this.save(data);
    return { ok: true, message: "Repository removed." };
  }

  clear(profile: string): number {
    const data = this.load();
    const removed = data[profile]?.length ?? 0;
    data[profile] = [];
    this.save(data);
    return removed;
  }

  private ensureFile(): void {
    if (existsSync(this.filePath)) return;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify({}), "utf-8");
  }

  private load(): StoredRepos {
    this.ensureFile();
    const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
    if (!isStoredRepos(parsed)) {
      throw new Error(`Repository file ${this.filePath} is malformed`);
    }
    return parsed;
  }

  private save(data: StoredRepos): void {
    writeFileSync(this.filePath, JSON.stringify(data, null, 2), "utf-8");
  }
}

function isStoredRepos(value: unknown): value is StoredRepos {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (repos) => Array.isArray(repos) && repos.every((r) => typeof r === "string"),
  );
}

import type { RepoRef } from "../types";
import { RepoInputError } from "./errors";

const GITHUB_URL_PREFIX = "https://github.com/";
const GITHUB_URL_PATTERN = /^https:\/\/github\.com\/([^/]+)\/([^/?#]+)/;

/**
 * Parses "owner/repo" or a github.com URL into a repository reference
 */
export function parseRepoInput(input: string): RepoRef {
  const value = input.trim();

  if (value.startsWith(GITHUB_URL_PREFIX)) {
    const match = GITHUB_URL_PATTERN.exec(value);
    if (!match) {
      throw new RepoInputError("Cannot parse repository URL");
    }
    const name = match[2].replace(/\.git$/, "");
    if (!name) {
      throw new RepoInputError("Cannot parse repository URL");
    }
    return { owner: match[1], name };
  }

  const slash = value.indexOf("/");
  if (slash === -1) {
    throw new RepoInputError("Please enter in owner/repo format");
  }

  const owner = value.slice(0, slash);
  const name = value.slice(slash + 1);
  if (!owner || !name) {
    throw new RepoInputError("Please enter in owner/repo format");
  }

  return { owner, name };
}

export function formatRepo(ref: RepoRef): string {
  return `${ref.owner}/${ref.name}`;
}

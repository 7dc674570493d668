import type { ReleaseEntry, RepoRef } from "../types";
import type { GitHubErrorBody, GitHubRelease } from "./types";
import { GitHubApiError, errorMessage } from "../utils/errors";
import { retryWithBackoff } from "../utils/concurrency";
import { formatRepo } from "../utils/repo-input";

const GITHUB_API_URL = "https://api.github.com";
const DAY_MS = 24 * 60 * 60 * 1000;

export const RELEASES_PER_PAGE = 100;

export interface FetchReleasesOptions {
  token?: string | null;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  includePrereleases?: boolean;
  now?: Date;
  onPage?: (page: number, fetched: number) => void;
}

function buildHeaders(token?: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": "Release-Digest-CLI",
  };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }
  return headers;
}

function readErrorMessage(text: string): string {
  try {
    const body: GitHubErrorBody = JSON.parse(text);
    return body.message ?? text;
  } catch {
    return text;
  }
}

async function toApiError(response: Response, repo: string): Promise<GitHubApiError> {
  const detail = readErrorMessage(await response.text());

  switch (response.status) {
    case 401:
      return new GitHubApiError(401, "GitHub authentication failed (401). Check GITHUB_TOKEN.");
    case 403:
    case 429: {
      const reset = response.headers.get("x-ratelimit-reset");
      const resetAt = reset ? ` Resets at ${new Date(Number(reset) * 1000).toISOString()}.` : "";
      return new GitHubApiError(
        response.status,
        `GitHub API rate limit exceeded (${response.status}).${resetAt}`,
      );
    }
    case 404:
      return new GitHubApiError(404, `Repository ${repo} not found (404).`);
    default:
      return new GitHubApiError(
        response.status,
        `GitHub API request failed (${response.status}): ${detail}`,
      );
  }
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

async function readReleases(response: Response): Promise<GitHubRelease[]> {
  const text = await response.text();

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new GitHubApiError(0, "GitHub API returned invalid JSON");
  }

  if (!Array.isArray(body)) {
    throw new GitHubApiError(response.status, "GitHub API returned unexpected data structure");
  }
  return body;
}

async function requestPage(
  url: string,
  repo: string,
  token: string | null | undefined,
  timeoutMs: number,
): Promise<GitHubRelease[]> {
  try {
    // 타임아웃은 본문을 읽는 동안에도 적용됨
    const response = await fetch(url, {
      headers: buildHeaders(token),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw await toApiError(response, repo);
    }
    return await readReleases(response);
  } catch (error) {
    if (error instanceof GitHubApiError) throw error;
    if (isTimeout(error)) {
      throw new GitHubApiError(0, `GitHub API request timed out after ${timeoutMs}ms`);
    }
    throw new GitHubApiError(0, `GitHub API request failed: ${errorMessage(error)}`);
  }
}

/**
 * Fetches every release of a repository, following pagination
 */
export async function fetchAllReleases(
  ref: RepoRef,
  options: FetchReleasesOptions = {},
): Promise<GitHubRelease[]> {
  const { token, timeoutMs = 15000, maxRetries = 3, retryDelayMs = 1000, onPage } = options;
  const repo = formatRepo(ref);
  const baseUrl = `${GITHUB_API_URL}/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}/releases`;

  const allReleases: GitHubRelease[] = [];
  let page = 1;

  while (true) {
    const url = `${baseUrl}?page=${page}&per_page=${RELEASES_PER_PAGE}`;
    const releases = await retryWithBackoff(() => requestPage(url, repo, token, timeoutMs), {
      maxRetries,
      initialDelayMs: retryDelayMs,
      shouldRetry: (error) => error instanceof GitHubApiError && error.retryable,
      onRetry: (error, attempt) => {
        console.warn(`⚠️ ${repo}: ${error.message} (retry ${attempt}/${maxRetries})`);
      },
    });

    if (releases.length === 0) {
      break;
    }

    allReleases.push(...releases);
    onPage?.(page, allReleases.length);

    if (releases.length < RELEASES_PER_PAGE) {
      break;
    }
    page++;
  }

  return allReleases;
}

/**
 * Keeps published releases inside the trailing window, newest first, one entry per release id
 */
export function filterRecentReleases(
  releases: GitHubRelease[],
  days: number,
  options: { now?: Date; includePrereleases?: boolean } = {},
): ReleaseEntry[] {
  const { now = new Date(), includePrereleases = true } = options;
  const cutoff = now.getTime() - days * DAY_MS;
  const seen = new Set<number>();
  const entries: ReleaseEntry[] = [];

  for (const release of releases) {
    if (!release.published_at) continue;
    if (seen.has(release.id)) continue;
    if (release.prerelease && !includePrereleases) continue;

    const publishedAt = Date.parse(release.published_at);
    if (isNaN(publishedAt)) {
      console.warn(`⚠️ Skipping ${release.tag_name}: cannot parse time "${release.published_at}"`);
      continue;
    }

    if (publishedAt >= cutoff) {
      seen.add(release.id);
      entries.push({
        time: release.published_at,
        version: release.tag_name,
        name: release.name,
        description: release.body,
        prerelease: release.prerelease,
        url: release.html_url,
      });
    }
  }

  return entries;
}

/**
 * Fetches releases published in the last `days` days
 */
export async function getRecentReleases(
  ref: RepoRef,
  days: number,
  options: FetchReleasesOptions = {},
): Promise<ReleaseEntry[]> {
  const releases = await fetchAllReleases(ref, options);
  return filterRecentReleases(releases, days, {
    now: options.now,
    includePrereleases: options.includePrereleases,
  });
}

import type { DigestEvent, ReleaseEntry, RepoDigest, RepoRef } from "../types";
import { buildSummaryPrompts } from "../prompts/summary";
import { runWithConcurrency } from "../utils/concurrency";
import { errorMessage } from "../utils/errors";
import { parseRepoInput } from "../utils/repo-input";
import type { SummaryClient } from "./providers";

export type FetchReleases = (ref: RepoRef, days: number) => Promise<ReleaseEntry[]>;

export interface SummarizeOptions {
  days: number;
  language: string;
  maxPromptChars: number;
  concurrency?: number;
}

export interface SummarizerDeps {
  client: SummaryClient;
  fetchReleases: FetchReleases;
}

type FetchOutcome =
  | { ok: true; releases: ReleaseEntry[] }
  | { ok: false; message: string };

async function fetchOutcome(
  repo: string,
  days: number,
  fetchReleases: FetchReleases,
): Promise<FetchOutcome> {
  let ref: RepoRef;
  try {
    ref = parseRepoInput(repo);
  } catch (error) {
    return { ok: false, message: `Invalid repository format for ${repo}: ${errorMessage(error)}` };
  }

  try {
    return { ok: true, releases: await fetchReleases(ref, days) };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

/**
 * Fetches releases for all repositories concurrently, then streams one summary
 * per repository in list order.
 */
export async function* summarizeRepositories(
  repos: string[],
  options: SummarizeOptions,
  deps: SummarizerDeps,
): AsyncGenerator<DigestEvent> {
  const outcomes = await runWithConcurrency(
    repos,
    (repo) => fetchOutcome(repo, options.days, deps.fetchReleases),
    options.concurrency ?? 4,
  );

  for (let i = 0; i < repos.length; i++) {
    const repo = repos[i];
    const outcome = outcomes[i];

    if (!outcome.ok) {
      yield { type: "failed", repo, message: outcome.message };
      continue;
    }

    const { releases } = outcome;
    yield { type: "fetched", repo, releases };

    if (releases.length === 0) {
      yield { type: "skipped", repo, reason: `No releases found in the last ${options.days} days` };
      continue;
    }

    const prompts = buildSummaryPrompts(
      releases,
      options.days,
      options.language,
      options.maxPromptChars,
    );

    let summary = "";
    let failure: string | null = null;

    try {
      for (let part = 1; part <= prompts.length; part++) {
        if (prompts.length > 1) {
          const heading = `${part > 1 ? "\n\n" : ""}### Part ${part} of ${prompts.length}\n\n`;
          summary += heading;
          yield { type: "chunk", repo, part, text: heading };
        }

        for await (const text of deps.client.streamSummary(prompts[part - 1])) {
          summary += text;
          yield { type: "chunk", repo, part, text };
        }
      }
    } catch (error) {
      failure = errorMessage(error);
    }

    if (failure !== null) {
      yield { type: "failed", repo, message: failure };
    } else {
      yield { type: "done", repo, summary, releaseCount: releases.length };
    }
  }
}

/**
 * Folds a pipeline event into the per-repository results
 */
export function recordDigestEvent(results: Map<string, RepoDigest>, event: DigestEvent): void {
  switch (event.type) {
    case "fetched":
    case "chunk":
      return;
    case "skipped":
      results.set(event.repo, {
        repo: event.repo,
        status: "skipped",
        summary: "",
        releaseCount: 0,
        message: event.reason,
      });
      return;
    case "failed":
      results.set(event.repo, {
        repo: event.repo,
        status: "failed",
        summary: "",
        releaseCount: 0,
        message: event.message,
      });
      return;
    case "done":
      results.set(event.repo, {
        repo: event.repo,
        status: "done",
        summary: event.summary,
        releaseCount: event.releaseCount,
      });
      return;
  }
}

export function renderMarkdownReport(
  digests: RepoDigest[],
  options: { days: number; language: string; generatedAt?: Date },
): string {
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  const lines = [
    "# GitHub Release Summary",
    "",
    `- Window: last ${options.days} days`,
    `- Language: ${options.language}`,
    `- Generated: ${generatedAt}`,
  ];

  for (const digest of digests) {
    lines.push("");
    switch (digest.status) {
      case "done":
        lines.push(
          `## ${digest.repo} (${digest.releaseCount} release${digest.releaseCount === 1 ? "" : "s"})`,
          "",
          digest.summary.trim(),
        );
        break;
      case "skipped":
        lines.push(`## ${digest.repo}`, "", `_Skipped: ${digest.message ?? ""}_`);
        break;
      case "failed":
        lines.push(`## ${digest.repo}`, "", `_Failed: ${digest.message ?? ""}_`);
        break;
    }
  }

  return lines.join("\n") + "\n";
}

import type { ReleaseEntry } from "../types";

const TRUNCATION_SUFFIX = "...";

export interface PromptPart {
  index: number;
  total: number;
}

export function serializeReleases(releases: ReleaseEntry[]): string {
  return JSON.stringify(releases, null, 2);
}

/**
 * Summary prompt for one batch of releases
 */
export function buildSummaryPrompt(
  releasesJson: string,
  days: number,
  language: string,
  part?: PromptPart,
): string {
  const partNote =
    part && part.total > 1
      ? ` This is part ${part.index} of ${part.total} of the data; summarize only the releases included here.`
      : "";

  return (
    `Please extract and summarize the important revision content, version number, ` +
    `and release time from the following GitHub releases JSON data for the past ${days} days. ` +
    `Provide a concise summary in ${language}.${partNote}\n\n` +
    `Data:\n${releasesJson}`
  );
}

/**
 * Shortens the description until the release serializes within maxChars
 */
function fitRelease(release: ReleaseEntry, maxChars: number): ReleaseEntry {
  let overflow = serializeReleases([release]).length - maxChars;
  if (overflow <= 0) {
    return release;
  }

  const description = release.description ?? "";
  let keep = description.length;

  while (keep > 0) {
    keep = Math.max(0, keep - overflow - TRUNCATION_SUFFIX.length);
    const truncated = { ...release, description: description.slice(0, keep) + TRUNCATION_SUFFIX };
    const size = serializeReleases([truncated]).length;
    if (size <= maxChars) {
      return truncated;
    }
    overflow = size - maxChars;
  }

  return { ...release, description: TRUNCATION_SUFFIX };
}

/**
 * Groups releases in order so that each group's JSON stays within maxChars
 */
export function batchReleases(releases: ReleaseEntry[], maxChars: number): ReleaseEntry[][] {
  const batches: ReleaseEntry[][] = [];
  let current: ReleaseEntry[] = [];

  for (const release of releases) {
    const candidate = [...current, release];
    if (serializeReleases(candidate).length <= maxChars) {
      current = candidate;
      continue;
    }

    if (current.length > 0) {
      batches.push(current);
      current = [];
    }

    const fitted = fitRelease(release, maxChars);
    if (fitted === release) {
      current = [release];
    } else {
      batches.push([fitted]);
    }
  }

  if (current.length > 0) {
    batches.push(current);
  }

  return batches;
}

export function buildSummaryPrompts(
  releases: ReleaseEntry[],
  days: number,
  language: string,
  maxChars: number,
): string[] {
  const batches = batchReleases(releases, maxChars);
  return batches.map((batch, i) =>
    buildSummaryPrompt(serializeReleases(batch), days, language, {
      index: i + 1,
      total: batches.length,
    }),
  );
}

import { describe, expect, it } from "vitest";
import type { ReleaseEntry } from "../types";
import {
  batchReleases,
  buildSummaryPrompt,
  buildSummaryPrompts,
  serializeReleases,
} from "./summary";

function entry(version: string, description: string | null = `Changes in ${version}`): ReleaseEntry {
  return {
    time: "2026-03-09T10:00:00Z",
    version,
    name: version,
    description,
    prerelease: false,
    url: `https://github.com/octocat/hello-world/releases/tag/${version}`,
  };
}

describe("buildSummaryPrompt", () => {
  it("asks for a summary of the window in the chosen language", () => {
    expect(buildSummaryPrompt("[]", 7, "English")).toBe(
      "Please extract and summarize the important revision content, version number, " +
        "and release time from the following GitHub releases JSON data for the past 7 days. " +
        "Provide a concise summary in English.\n\nData:\n[]",
    );
  });

  it("marks partial data", () => {
    const prompt = buildSummaryPrompt("[]", 30, "German", { index: 2, total: 3 });

    expect(prompt).toContain(
      "Provide a concise summary in German. This is part 2 of 3 of the data; summarize only the releases included here.\n\nData:\n[]",
    );
  });

  it("leaves single-part prompts unmarked", () => {
    expect(buildSummaryPrompt("[]", 7, "English", { index: 1, total: 1 })).toBe(
      buildSummaryPrompt("[]", 7, "English"),
    );
  });
});

describe("serializeReleases", () => {
  it("pretty-prints and keeps non-ASCII text", () => {
    const releases = [entry("v2.0.0", "修复了登录问题")];

    expect(serializeReleases(releases)).toBe(JSON.stringify(releases, null, 2));
    expect(serializeReleases(releases)).toContain('"description": "修复了登录问题"');
  });
});

describe("batchReleases", () => {
  const a = entry("v1.0.1");
  const b = entry("v1.0.2");
  const c = entry("v1.0.3");

  it("keeps everything in one batch when it fits", () => {
    expect(batchReleases([a, b, c], 100_000)).toEqual([[a, b, c]]);
  });

  it("starts a new batch when the limit would be exceeded", () => {
    const limit = serializeReleases([a, b]).length;

    expect(batchReleases([a, b, c], limit)).toEqual([[a, b], [c]]);
  });

  it("truncates a release that is too large on its own", () => {
    const big = entry("v2.0.0", "x".repeat(2000));
    const limit = 400;

    const batches = batchReleases([a, big, c], limit);

    expect(batches).toHaveLength(3);
    expect(batches[0]).toEqual([a]);
    expect(batches[2]).toEqual([c]);

    const [truncated] = batches[1];
    expect(truncated.version).toBe("v2.0.0");
    expect(truncated.description?.endsWith("...")).toBe(true);
    expect(serializeReleases([truncated]).length).toBeLessThanOrEqual(limit);
  });

  it("returns no batches for no releases", () => {
    expect(batchReleases([], 1000)).toEqual([]);
  });
});

describe("buildSummaryPrompts", () => {
  it("builds one prompt per batch", () => {
    const releases = [entry("v1.0.1"), entry("v1.0.2")];
    const limit = serializeReleases([releases[0]]).length;

    const prompts = buildSummaryPrompts(releases, 7, "Spanish", limit);

    expect(prompts).toHaveLength(2);
    expect(prompts[0]).toContain("This is part 1 of 2 of the data");
    expect(prompts[1]).toContain(`Data:\n${serializeReleases([releases[1]])}`);
  });
});

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Express } from "express";
import type { SummaryClient } from "../services/providers";
import type { FetchReleases } from "../services/summarizer";
import type { DigestEvent, ReleaseEntry } from "../types";
import type { Config } from "../utils/config";
import { RepoStore } from "../utils/repo-storage";
import { createApp } from "./app";
import type { CreateClient } from "./routes/summarize";

const SESSION = "test-session";

function testConfig(reposFile: string): Config {
  return {
    githubToken: null,
    openaiApiKey: null,
    zhipuaiApiKey: null,
    geminiApiKey: null,
    llmProvider: "openai",
    llmModel: null,
    maxPromptChars: 60000,
    defaultDays: 7,
    defaultLanguage: "English",
    reposFile,
    githubConcurrency: 2,
    githubTimeoutMs: 1000,
    maxRetries: 0,
    retryDelay: 1,
    apiPort: 0,
    debug: false,
    logApiResponses: false,
  };
}

const release: ReleaseEntry = {
  time: "2026-03-09T10:00:00Z",
  version: "v1.0.0",
  name: "v1.0.0",
  description: "First release",
  prerelease: false,
  url: "https://github.com/octocat/hello-world/releases/tag/v1.0.0",
};

const fakeClient: SummaryClient = {
  provider: "openai",
  model: "test-model",
  async *streamSummary() {
    yield "Shipped ";
    yield "v1.0.0";
  },
};

function parseEvents(text: string): DigestEvent[] {
  return text
    .split("\n")
    .filter((line) => line.trim())
    .map((line) => JSON.parse(line));
}

describe("createApp", () => {
  let dir: string;
  let store: RepoStore;
  let app: Express;
  let createClient: ReturnType<typeof vi.fn<CreateClient>>;
  let fetchReleases: ReturnType<typeof vi.fn<FetchReleases>>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "release-digest-server-"));
    store = new RepoStore(join(dir, "repos.json"));
    createClient = vi.fn<CreateClient>().mockReturnValue(fakeClient);
    fetchReleases = vi.fn<FetchReleases>().mockResolvedValue([release]);
    app = createApp({
      config: testConfig(join(dir, "repos.json")),
      store,
      createClient,
      fetchReleases,
      logRequests: false,
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports health", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
  });

  it("issues a session id when the client has none", async () => {
    const res = await request(app).get("/api/repos");

    expect(res.status).toBe(200);
    expect(res.headers["x-session-id"]).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
    expect(res.body).toEqual({ sessionId: res.headers["x-session-id"], repos: [] });
  });

  it("adds, lists and removes repositories per session", async () => {
    const added = await request(app)
      .post("/api/repos")
      .set("x-session-id", SESSION)
      .send({ repo: "https://github.com/octocat/hello-world" });

    expect(added.status).toBe(201);
    expect(added.body).toEqual({ message: "Repository added.", repos: ["octocat/hello-world"] });

    const duplicate = await request(app)
      .post("/api/repos")
      .set("x-session-id", SESSION)
      .send({ repo: "octocat/hello-world" });
    expect(duplicate.status).toBe(400);
    expect(duplicate.body).toEqual({ error: "Repository already exists." });

    const other = await request(app).get("/api/repos").set("x-session-id", "other-session");
    expect(other.body.repos).toEqual([]);

    const removed = await request(app)
      .delete("/api/repos/octocat/hello-world")
      .set("x-session-id", SESSION);
    expect(removed.status).toBe(200);
    expect(removed.body).toEqual({ message: "Repository removed.", repos: [] });

    const missing = await request(app)
      .delete("/api/repos/octocat/hello-world")
      .set("x-session-id", SESSION);
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "Repository not found." });
  });

  it("removes entries whose name contains a slash", async () => {
    const added = await request(app)
      .post("/api/repos")
      .set("x-session-id", SESSION)
      .send({ repo: "octocat/hello/world" });
    expect(added.body.repos).toEqual(["octocat/hello/world"]);

    const removed = await request(app)
      .delete("/api/repos/octocat/hello/world")
      .set("x-session-id", SESSION);
    expect(removed.status).toBe(200);
    expect(removed.body).toEqual({ message: "Repository removed.", repos: [] });

    store.add(SESSION, "octocat/hello/world");
    const encoded = await request(app)
      .delete("/api/repos/octocat/hello%2Fworld")
      .set("x-session-id", SESSION);
    expect(encoded.status).toBe(200);
    expect(encoded.body.repos).toEqual([]);
  });

  it("rejects empty and malformed repositories", async () => {
    const empty = await request(app).post("/api/repos").set("x-session-id", SESSION).send({});
    expect(empty.status).toBe(400);
    expect(empty.body).toEqual({ error: "Please enter a repository." });

    const invalid = await request(app)
      .post("/api/repos")
      .set("x-session-id", SESSION)
      .send({ repo: "hello-world" });
    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual({ error: "Invalid repository format." });
  });

  it("streams summary events as NDJSON", async () => {
    store.add(SESSION, "octocat/hello-world");

    const res = await request(app)
      .post("/api/summarize")
      .set("x-session-id", SESSION)
      .send({ days: 14, language: "German", apiKey: "test-key" })
      .buffer(true);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^application\/x-ndjson/);
    expect(parseEvents(res.text)).toEqual([
      { type: "fetched", repo: "octocat/hello-world", releases: [release] },
      { type: "chunk", repo: "octocat/hello-world", part: 1, text: "Shipped " },
      { type: "chunk", repo: "octocat/hello-world", part: 1, text: "v1.0.0" },
      { type: "done", repo: "octocat/hello-world", summary: "Shipped v1.0.0", releaseCount: 1 },
    ]);
    expect(createClient).toHaveBeenCalledWith("openai", "test-key", {
      model: null,
      logResponses: false,
    });
    expect(fetchReleases).toHaveBeenCalledWith({ owner: "octocat", name: "hello-world" }, 14);
  });

  it("refuses to summarize an empty list", async () => {
    const res = await request(app)
      .post("/api/summarize")
      .set("x-session-id", SESSION)
      .send({ apiKey: "test-key" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "No repositories saved." });
  });

  it("answers 500 when the repository file is corrupted", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    writeFileSync(join(dir, "repos.json"), "{not json", "utf-8");

    const res = await request(app)
      .post("/api/summarize")
      .set("x-session-id", SESSION)
      .send({ apiKey: "test-key" });

    expect(res.status).toBe(500);
    expect(res.body.error).toBe("Internal Server Error");
    expect(createClient).not.toHaveBeenCalled();
  });

  it("validates the request", async () => {
    store.add(SESSION, "octocat/hello-world");

    const badDays = await request(app)
      .post("/api/summarize")
      .set("x-session-id", SESSION)
      .send({ days: 0, apiKey: "test-key" });
    expect(badDays.status).toBe(400);
    expect(badDays.body).toEqual({
      error: "Number of days must be an integer between 1 and 365",
    });

    const badProvider = await request(app)
      .post("/api/summarize")
      .set("x-session-id", SESSION)
      .send({ provider: "mystery", apiKey: "test-key" });
    expect(badProvider.status).toBe(400);

    const noKey = await request(app)
      .post("/api/summarize")
      .set("x-session-id", SESSION)
      .send({ provider: "zhipuai" });
    expect(noKey.status).toBe(400);
    expect(noKey.body).toEqual({
      error: "Missing ZhipuAI API key. Provide apiKey or set ZHIPUAI_API_KEY.",
    });
    expect(createClient).not.toHaveBeenCalled();
  });

  it("serves the front end", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/html/);
    expect(res.text).toContain("<title>GitHub Release Summarizer</title>");
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/api/unknown");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not Found" });
  });
});

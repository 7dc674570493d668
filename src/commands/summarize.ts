import { writeFileSync } from "fs";
import { Command, Option } from "commander";
import { password } from "@inquirer/prompts";
import ora from "ora";
import { getRecentReleases } from "../api";
import { createSummaryClient } from "../services/llm";
import { API_KEY_ENV, PROVIDER_LABELS, type SummaryClient } from "../services/providers";
import {
  recordDigestEvent,
  renderMarkdownReport,
  summarizeRepositories,
} from "../services/summarizer";
import { LLM_PROVIDERS, OUTPUT_LANGUAGES, type LlmProvider, type RepoDigest } from "../types";
import {
  apiKeyFor,
  loadConfig,
  parseDays,
  parseLanguage,
  parseProvider,
  type Config,
} from "../utils/config";
import { ValidationError } from "../utils/errors";
import { createStore, exitWithError, getProfile } from "./shared";

interface SummarizeCommandOptions {
  days?: string;
  language?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  output?: string;
  repo?: string[];
  prereleases: boolean;
}

export const summarizeCommand = new Command("summarize")
  .description("Summarize recent releases of the tracked repositories")
  .option("-d, --days <n>", "Number of days to look back (1-365)")
  .addOption(
    new Option("-l, --language <language>", "Output language").choices(OUTPUT_LANGUAGES),
  )
  .addOption(new Option("-p, --provider <provider>", "LLM provider").choices(LLM_PROVIDERS))
  .option("-m, --model <model>", "Model name (defaults to the provider's model)")
  .option("--api-key <key>", "LLM API key (defaults to the provider's environment variable)")
  .option("-o, --output <file>", "Also write a Markdown report to this file")
  .option("--repo <repo...>", "Summarize these repositories instead of the saved list")
  .option("--no-prereleases", "Leave prereleases out of the summary")
  .action(async (options: SummarizeCommandOptions, command: Command) => {
    try {
      const config = loadConfig();
      const days = parseDays(options.days ?? config.defaultDays);
      const language = parseLanguage(options.language ?? config.defaultLanguage);
      const provider = parseProvider(options.provider ?? config.llmProvider);

      const repos = options.repo?.length
        ? options.repo
        : createStore(config).read(getProfile(command));
      if (repos.length === 0) {
        throw new ValidationError(
          "No repositories saved. Add one with: release-digest repos --add owner/repo",
        );
      }

      const apiKey = await resolveApiKey(config, provider, options.apiKey);
      const client = createSummaryClient(provider, apiKey, {
        model: options.model ?? config.llmModel,
        logResponses: config.logApiResponses,
      });

      if (config.debug) {
        console.log("\n[DEBUG] Config:", {
          provider,
          model: client.model,
          days,
          language,
          maxPromptChars: config.maxPromptChars,
        });
      }

      const digests = await runSummaries(config, repos, {
        days,
        language,
        includePrereleases: options.prereleases,
        client,
      });

      if (options.output) {
        writeFileSync(options.output, renderMarkdownReport(digests, { days, language }), "utf-8");
        console.log(`\n💾 Report saved to ${options.output}`);
      }

      const failed = digests.filter((d) => d.status === "failed").length;
      if (failed > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      exitWithError(error);
    }
  });

async function resolveApiKey(
  config: Config,
  provider: LlmProvider,
  flagValue: string | undefined,
): Promise<string> {
  const key = flagValue?.trim() || apiKeyFor(config, provider);
  if (key) {
    return key;
  }

  if (process.stdin.isTTY) {
    return password({ message: `Enter ${PROVIDER_LABELS[provider]} API Key`, mask: "*" });
  }

  throw new ValidationError(
    `Missing ${PROVIDER_LABELS[provider]} API key. Set ${API_KEY_ENV[provider]} or pass --api-key.`,
  );
}

async function runSummaries(
  config: Config,
  repos: string[],
  options: {
    days: number;
    language: string;
    includePrereleases: boolean;
    client: SummaryClient;
  },
): Promise<RepoDigest[]> {
  const { days, language, includePrereleases, client } = options;
  const results = new Map<string, RepoDigest>();
  const announced = new Set<string>();

  const spinner = ora(`Fetching GitHub releases for ${repos.length} repositories...`).start();
  let fetching = true;

  const events = summarizeRepositories(
    repos,
    {
      days,
      language,
      maxPromptChars: config.maxPromptChars,
      concurrency: config.githubConcurrency,
    },
    {
      client,
      fetchReleases: (ref, windowDays) =>
        getRecentReleases(ref, windowDays, {
          token: config.githubToken,
          timeoutMs: config.githubTimeoutMs,
          maxRetries: config.maxRetries,
          retryDelayMs: config.retryDelay,
          includePrereleases,
        }),
    },
  );

  for await (const event of events) {
    if (fetching) {
      spinner.succeed(`Fetched GitHub releases for ${repos.length} repositories`);
      fetching = false;
    }

    recordDigestEvent(results, event);

    if (!announced.has(event.repo)) {
      announced.add(event.repo);
      console.log(`\n#### Repository: ${event.repo}`);
    }

    switch (event.type) {
      case "fetched":
        console.log(`ℹ️ ${event.releases.length} releases in the last ${days} days`);
        if (event.releases.length > 0) {
          console.log(`🤖 Generating summary with ${PROVIDER_LABELS[client.provider]} (${client.model})...\n`);
        }
        break;
      case "chunk":
        process.stdout.write(event.text);
        break;
      case "skipped":
        console.log(`⚠️ ${event.reason}. Skipping summarization for this repository.`);
        break;
      case "failed":
        console.error(`\n❌ ${event.message}`);
        break;
      case "done":
        process.stdout.write(`\n${"─".repeat(60)}\n`);
        break;
    }
  }

  if (fetching) {
    spinner.stop();
  }

  const digests = [...results.values()];
  const count = (status: RepoDigest["status"]) => digests.filter((d) => d.status === status).length;

  console.log("\n📊 Results:");
  console.log(`  ✅ Summarized: ${count("done")}`);
  console.log(`  ⚠️ Skipped: ${count("skipped")}`);
  console.log(`  ❌ Failed: ${count("failed")}`);

  return digests;
}

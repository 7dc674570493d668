import { describe, expect, it, vi } from "vitest";
import { LlmError } from "../utils/errors";
import { OpenAICompatibleClient } from "./openai";
import { ADVISOR_SYSTEM_PROMPT, ENGINEER_SYSTEM_PROMPT, ZHIPUAI_BASE_URL } from "./providers";

const { create, constructed } = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return { create: vi.fn(), constructed };
});

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create } };

    constructor(options: unknown) {
      constructed.push(options);
    }
  },
}));

async function* deltas(...contents: (string | undefined)[]) {
  for (const content of contents) {
    yield { choices: [{ delta: { content } }] };
  }
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const text of iterable) {
    out.push(text);
  }
  return out;
}

describe("OpenAICompatibleClient", () => {
  it("streams non-empty deltas from a chat completion", async () => {
    create.mockResolvedValue(deltas("Hel", undefined, "", "lo"));
    const client = new OpenAICompatibleClient({
      provider: "openai",
      apiKey: "test-key",
      model: "gpt-4o",
      systemPrompt: ENGINEER_SYSTEM_PROMPT,
      temperature: 0,
    });

    expect(await collect(client.streamSummary("Summarize"))).toEqual(["Hel", "lo"]);
    expect(create).toHaveBeenCalledWith({
      model: "gpt-4o",
      messages: [
        { role: "system", content: "You are a seasoned software engineer." },
        { role: "user", content: "Summarize" },
      ],
      stream: true,
      temperature: 0,
    });
  });

  it("points ZhipuAI at its compatible endpoint", async () => {
    create.mockResolvedValue(deltas("你好"));
    const client = new OpenAICompatibleClient({
      provider: "zhipuai",
      apiKey: "test-key",
      model: "glm-4-flash",
      baseURL: ZHIPUAI_BASE_URL,
      systemPrompt: ADVISOR_SYSTEM_PROMPT,
    });

    expect(await collect(client.streamSummary("Summarize"))).toEqual(["你好"]);
    expect(constructed.at(-1)).toEqual({
      apiKey: "test-key",
      baseURL: "https://open.bigmodel.cn/api/paas/v4/",
    });
    expect(create.mock.lastCall?.[0]).toMatchObject({
      model: "glm-4-flash",
      messages: [{ role: "system", content: ADVISOR_SYSTEM_PROMPT }, { role: "user", content: "Summarize" }],
    });
  });

  it("wraps provider errors", async () => {
    create.mockRejectedValue(new Error("401 Incorrect API key provided"));
    const client = new OpenAICompatibleClient({
      provider: "openai",
      apiKey: "test-key",
      model: "gpt-4o",
      systemPrompt: ENGINEER_SYSTEM_PROMPT,
    });

    const error = await collect(client.streamSummary("Summarize")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toHaveProperty(
      "message",
      "Error calling OpenAI API: 401 Incorrect API key provided",
    );
  });
});

import { describe, expect, it, vi } from "vitest";
import { GeminiClient } from "./gemini";

const { generateContentStream } = vi.hoisted(() => ({ generateContentStream: vi.fn() }));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { generateContentStream };
  },
}));

async function* chunks(...texts: (string | undefined)[]) {
  for (const text of texts) {
    yield { text };
  }
}

describe("GeminiClient", () => {
  it("streams text chunks with the system instruction", async () => {
    generateContentStream.mockResolvedValue(chunks("Release ", undefined, "notes"));
    const client = new GeminiClient({
      apiKey: "test-key",
      model: "gemini-2.5-flash",
      systemPrompt: "You are a seasoned software engineer.",
      temperature: 0,
    });

    const out: string[] = [];
    for await (const text of client.streamSummary("Summarize")) {
      out.push(text);
    }

    expect(out).toEqual(["Release ", "notes"]);
    expect(generateContentStream).toHaveBeenCalledWith({
      model: "gemini-2.5-flash",
      contents: "Summarize",
      config: {
        systemInstruction: "You are a seasoned software engineer.",
        temperature: 0,
        maxOutputTokens: undefined,
      },
    });
  });

  it("wraps API failures", async () => {
    generateContentStream.mockRejectedValue(new Error("API key not valid"));
    const client = new GeminiClient({
      apiKey: "test-key",
      model: "gemini-2.5-flash",
      systemPrompt: "You are a seasoned software engineer.",
    });

    const iterator = client.streamSummary("Summarize");

    await expect(iterator.next()).rejects.toThrow("Error calling Gemini API: API key not valid");
  });
});

/**
 * Unit tests for LLM adapters (stub and factory).
 */

import { AnthropicLLM, OpenAILLM, StubLLM, createLLM } from "../../../src/adapters/llm";
import type { AppConfig } from "../../../src/config";

function llmConfig(llm: AppConfig["llm"]): Pick<AppConfig, "llm"> {
  return { llm };
}

describe("StubLLM", () => {
  it("returns empty response by default", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("");
  });

  it("returns the configured reply and records messages", async () => {
    const llm = new StubLLM("fixed");
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("fixed");
    expect(llm.lastMessages).toEqual([{ role: "user", content: "Hello" }]);
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(llmConfig({ provider: "stub" }))).toBeInstanceOf(StubLLM);
  });

  it("falls back to StubLLM when the provider key is missing", () => {
    expect(createLLM(llmConfig({ provider: "openai" }))).toBeInstanceOf(StubLLM);
    expect(createLLM(llmConfig({ provider: "anthropic" }))).toBeInstanceOf(StubLLM);
  });

  it("builds the OpenAI and Anthropic adapters when keys are set", () => {
    expect(createLLM(llmConfig({ provider: "openai", openaiApiKey: "test-key" }))).toBeInstanceOf(OpenAILLM);
    expect(createLLM(llmConfig({ provider: "anthropic", anthropicApiKey: "test-key" }))).toBeInstanceOf(AnthropicLLM);
  });
});

import { PromptManager } from "../../../src/prompts/prompt-manager";
import { ASSISTANT_SYSTEM_PROMPT, buildLongTermContext } from "../../../src/prompts/assistant";
import { createTurn } from "../../../src/memory/short-term";

describe("PromptManager", () => {
  it("builds system, history, then the new input", () => {
    const pm = new PromptManager();
    const msgs = pm.buildMessages({
      history: [createTurn("user", "Hi"), createTurn("assistant", "Hello!")],
      longTermMemory: "",
      userInput: "What did I say?",
    });
    expect(msgs).toEqual([
      { role: "system", content: ASSISTANT_SYSTEM_PROMPT },
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello!" },
      { role: "user", content: "What did I say?" },
    ]);
  });

  it("adds long-term memory to the system prompt", () => {
    const pm = new PromptManager({ systemPrompt: "Be brief." });
    const msgs = pm.buildMessages({
      history: [],
      longTermMemory: "User said: Hello! My name is Alice.",
      userInput: "Do you remember my name?",
    });
    expect(msgs[0]).toEqual({
      role: "system",
      content: "Be brief.\n\nLong-term memory: User said: Hello! My name is Alice.",
    });
    expect(msgs).toHaveLength(2);
  });

  it("accepts a custom longTermContextBuilder", () => {
    const pm = new PromptManager({
      systemPrompt: "S",
      longTermContextBuilder: (facts) => `FACTS<${facts}>`,
    });
    const msgs = pm.buildMessages({ history: [], longTermMemory: "x", userInput: "y" });
    expect(msgs[0].content).toBe("S\n\nFACTS<x>");
  });
});

describe("buildLongTermContext", () => {
  it("is empty when there are no facts", () => {
    expect(buildLongTermContext("")).toBe("");
    expect(buildLongTermContext("   ")).toBe("");
  });
});

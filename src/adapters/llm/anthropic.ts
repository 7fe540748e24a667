/**
 * Anthropic Messages LLM adapter.
 * System messages are merged into the top-level system field.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

type ConversationRole = "user" | "assistant";

function isConversationRole(role: Message["role"]): role is ConversationRole {
  return role === "user" || role === "assistant";
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const msgs: Array<{ role: ConversationRole; content: string }> = [];
    for (const m of messages) {
      if (isConversationRole(m.role)) msgs.push({ role: m.role, content: m.content });
    }
    const response = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? 256,
      temperature: options?.temperature,
      system: system || undefined,
      messages: msgs,
    });
    const text = response.content
      .map((b) => (b.type === "text" ? b.text : ""))
      .join("");
    return { text };
  }
}

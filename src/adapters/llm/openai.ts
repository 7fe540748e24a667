/**
 * OpenAI Chat Completions LLM adapter.
 */

import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const response = await this.client.chat.completions.create({
      model: this.cfg.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: options?.maxTokens ?? 256,
      temperature: options?.temperature,
    });
    return { text: response.choices[0]?.message?.content ?? "" };
  }
}

/**
 * Stub LLM adapter for tests or when no provider is configured.
 * Returns a fixed reply and remembers the last messages it was given.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  lastMessages: Message[] = [];

  constructor(private readonly reply: string = "") {}

  async chat(messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    this.lastMessages = messages.map((m) => ({ ...m }));
    return { text: this.reply };
  }
}

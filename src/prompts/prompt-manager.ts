import type { Message } from "../adapters/llm";
import type { Turn } from "../memory/types";
import { ASSISTANT_SYSTEM_PROMPT, buildLongTermContext, turnsToMessages } from "./assistant";

export type LongTermContextBuilder = (longTermMemory: string) => string;

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to ASSISTANT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Optional: override how long-term memory is injected into the system prompt. */
  longTermContextBuilder?: LongTermContextBuilder;
}

export interface BuildPromptArgs {
  /** Rendered short-term buffer, oldest first. */
  history: readonly Turn[];
  /** Rendered long-term store ("" when empty). */
  longTermMemory: string;
  userInput: string;
}

/**
 * PromptManager
 *
 * Turns the manager's rendered views plus the new input into the payload for the model call,
 * so prompt wording can change without touching memory or the orchestrator.
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly longTermContextBuilder: LongTermContextBuilder;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? ASSISTANT_SYSTEM_PROMPT;
    this.longTermContextBuilder = cfg.longTermContextBuilder ?? buildLongTermContext;
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    const memoryLine = this.longTermContextBuilder(args.longTermMemory);
    const system = memoryLine ? [this.systemPrompt, memoryLine].join("\n\n") : this.systemPrompt;
    return [
      { role: "system", content: system },
      ...turnsToMessages(args.history),
      { role: "user", content: args.userInput },
    ];
  }
}

/**
 * Orchestrator: coordinates memory -> prompt -> LLM -> memory for one chat interaction.
 * The model call runs outside any session lock; results are committed in one critical section.
 */

import type { ILLM, Message } from "../adapters/llm";
import type { SessionMemoryManager } from "../memory/manager";
import { createTurn } from "../memory/short-term";
import { PromptManager } from "../prompts/prompt-manager";
import { recordTurnMetrics } from "../metrics";
import { logger, logLlmCall } from "../logging";

const DEFAULT_LLM_TIMEOUT_MS = 25_000;
const DEFAULT_MAX_TOKENS = 256;

function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then((v) => { clearTimeout(timer); resolve(v); }, (e) => { clearTimeout(timer); reject(e); });
  });
}

export interface OrchestratorConfig {
  /** Prompt builder; defaults to PromptManager with ASSISTANT_SYSTEM_PROMPT. */
  promptManager?: PromptManager;
  /** Also offer the assistant reply to the retention policy. */
  retainAssistantReplies?: boolean;
  /** Max tokens per reply. */
  maxTokens?: number;
  /** Timeout for the model call. */
  llmTimeoutMs?: number;
}

export interface ChatCallbacks {
  onUserInput?: (sessionId: string, text: string) => void;
  onAgentReply?: (sessionId: string, text: string) => void;
}

export class ChatOrchestrator {
  private readonly promptManager: PromptManager;
  private readonly retainAssistantReplies: boolean;
  private readonly maxTokens: number;
  private readonly llmTimeoutMs: number;

  constructor(
    private readonly memory: SessionMemoryManager,
    private readonly llm: ILLM,
    config: OrchestratorConfig = {},
    private readonly callbacks: ChatCallbacks = {}
  ) {
    this.promptManager = config.promptManager ?? new PromptManager();
    this.retainAssistantReplies = config.retainAssistantReplies ?? false;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.llmTimeoutMs = config.llmTimeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
  }

  /**
   * Answer one user input for a session and commit the exchange to memory.
   * LLM errors and timeouts are logged and rethrown; memory is untouched in that case.
   */
  async handleUserInput(sessionId: string, userInput: string): Promise<string> {
    const turnStart = Date.now();
    this.memory.getOrCreateSession(sessionId);
    this.callbacks.onUserInput?.(sessionId, userInput);

    const { history, longTermMemory } = await this.memory.withSession(sessionId, (s) => ({
      history: s.shortTerm(),
      longTermMemory: s.longTerm(),
    }));
    const messages: Message[] = this.promptManager.buildMessages({ history, longTermMemory, userInput });

    const llmStart = Date.now();
    let reply: string;
    try {
      const response = await withTimeout(this.llm.chat(messages, { maxTokens: this.maxTokens }), this.llmTimeoutMs, "LLM");
      reply = response.text.trim();
    } catch (err) {
      logger.warn({ event: "LLM_FAILED", sessionId, err: err instanceof Error ? err.message : String(err) }, "LLM failed");
      throw err;
    }
    const llmLatencyMs = Date.now() - llmStart;
    logLlmCall(logger, messages.length, reply.length, llmLatencyMs);

    const retained = await this.memory.withSession(sessionId, async (s) => {
      s.appendTurn(createTurn("user", userInput));
      s.appendTurn(createTurn("assistant", reply));
      const kept = await s.recordForLongTerm(userInput, "user");
      if (this.retainAssistantReplies && reply) {
        await s.recordForLongTerm(reply, "assistant");
      }
      return kept;
    });
    this.callbacks.onAgentReply?.(sessionId, reply);

    recordTurnMetrics({
      sessionId,
      llmLatencyMs,
      turnLatencyMs: Date.now() - turnStart,
      longTermChars: longTermMemory.length,
      historyTurns: history.length,
      retained,
    });
    return reply;
  }
}

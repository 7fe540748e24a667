#!/usr/bin/env node
/**
 * Entry point: load config, build the memory manager and LLM, then chat on stdin.
 * Commands: /session <id> switches session, /memory prints long-term memory, /history prints turns,
 * /close drops the current session, /stats prints counters and the last turn's timings, /exit quits.
 * Uses the stub LLM when no provider key is configured.
 */

import * as readline from "readline";
import { loadConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { createSessionMemoryManager } from "./memory/manager";
import { ChatOrchestrator } from "./pipeline/orchestrator";
import { PromptManager } from "./prompts/prompt-manager";
import { getLastTurnMetrics } from "./metrics";
import { logger, logError } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  const memory = createSessionMemoryManager(config.memory);
  const llm = createLLM(config);
  const orchestrator = new ChatOrchestrator(memory, llm, {
    promptManager: new PromptManager({ systemPrompt: config.chat.systemPrompt }),
    retainAssistantReplies: config.memory.retainAssistantReplies,
    maxTokens: config.chat.maxTokens,
    llmTimeoutMs: config.chat.llmTimeoutMs,
  }, {
    onUserInput: (sessionId, text) => logger.debug({ event: "USER_INPUT", sessionId, textLength: text.length }, "User said something"),
    onAgentReply: (sessionId, text) => logger.debug({ event: "AGENT_REPLY", sessionId, textLength: text.length }, "Agent replied"),
  });

  let sessionId = process.env.SESSION_ID?.trim() || "default";
  logger.info({ event: "CHAT_READY", provider: config.llm.provider, sessionId }, "Chat ready");

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(`[${sessionId}] > `);
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (!input) {
      rl.prompt();
      continue;
    }
    if (input === "/exit") break;
    try {
      if (input.startsWith("/session")) {
        const next = input.slice("/session".length).trim();
        memory.getOrCreateSession(next);
        sessionId = next;
        rl.setPrompt(`[${sessionId}] > `);
      } else if (input === "/memory") {
        console.log((await memory.renderLongTerm(sessionId)) || "(no long-term memory)");
      } else if (input === "/history") {
        for (const t of await memory.renderShortTerm(sessionId)) console.log(`${t.role}: ${t.text}`);
      } else if (input === "/close") {
        await memory.closeSession(sessionId);
      } else if (input === "/stats") {
        console.log(JSON.stringify({ memory: memory.getStats(), lastTurn: getLastTurnMetrics() }, null, 2));
      } else {
        const reply = await orchestrator.handleUserInput(sessionId, input);
        console.log(reply || "(empty reply)");
      }
    } catch (err) {
      logError(logger, err instanceof Error ? err : new Error(String(err)), { sessionId });
    }
    rl.prompt();
  }
  rl.close();
}

main().catch((err) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});

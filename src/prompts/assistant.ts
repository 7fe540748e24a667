/**
 * Default system prompt and helpers for turning session memory into LLM messages.
 */

import type { Message } from "../adapters/llm";
import type { Turn } from "../memory/types";

export const ASSISTANT_SYSTEM_PROMPT = [
  "You are a helpful conversational assistant.",
  "Use the conversation so far and any long-term memory you are given to stay consistent with what the user told you earlier.",
  "If the user asks about something they said before, answer from memory when it is there and say so plainly when it is not.",
  "Keep replies concise.",
].join("\n");

/** Single line appended to the system prompt; empty when there are no facts. */
export function buildLongTermContext(longTermMemory: string): string {
  const facts = longTermMemory.trim();
  return facts ? `Long-term memory: ${facts}` : "";
}

/** Map short-term turns to chat messages, preserving order. */
export function turnsToMessages(turns: readonly Turn[]): Message[] {
  return turns.map((t) => ({ role: t.role, content: t.text }));
}

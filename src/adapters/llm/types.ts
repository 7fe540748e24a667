/**
 * LLM adapter types.
 * The model call is an external collaborator: memory hands it messages and stores the reply.
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** Max tokens to generate. */
  maxTokens?: number;
  /** Sampling temperature; provider default when unset. */
  temperature?: number;
}

export interface ChatResponse {
  /** Full text of the assistant reply. */
  text: string;
}

/** Messages in, assistant reply out. */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

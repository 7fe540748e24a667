/**
 * Env-based configuration for the session memory service.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type LlmProvider = "openai" | "anthropic" | "stub";

const LLM_PROVIDERS: readonly LlmProvider[] = ["openai", "anthropic", "stub"];

export interface AppConfig {
  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    /** Fixed reply used by the stub provider. */
    stubReply?: string;
  };

  /** Session memory tiers */
  memory: {
    /** Max long-term facts per session. Negative values fail when the manager is built. */
    longTermCapacity: number;
    /** Text longer than this many characters is retained. */
    retentionThresholdChars: number;
    /** Cap on short-term turns per session; unbounded when unset. */
    shortTermMaxTurns?: number;
    /** Max wait (ms) for a busy session; unbounded when unset. */
    lockTimeoutMs?: number;
    /** Also run assistant replies through the retention policy. */
    retainAssistantReplies: boolean;
  };

  /** Per-turn chat settings */
  chat: {
    llmTimeoutMs: number;
    maxTokens: number;
    /** Overrides the default assistant system prompt. */
    systemPrompt?: string;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

/** Parse an integer env var; undefined when unset. Anything but a whole decimal number throws. */
function getEnvInt(key: string): number | undefined {
  const v = getEnv(key);
  if (v === undefined) return undefined;
  if (!/^-?\d+$/.test(v)) {
    throw new RangeError(`${key} must be an integer (got "${v}")`);
  }
  return Number(v);
}

function getEnvFlag(key: string): boolean {
  const v = (getEnv(key) ?? "").toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

function parseProvider(value: string | undefined): LlmProvider {
  const v = (value ?? "").toLowerCase();
  return LLM_PROVIDERS.find((p) => p === v) ?? "stub";
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER (or MODEL_PROVIDER) selects the adapter (openai, anthropic, stub).
 */
export function loadConfig(): AppConfig {
  const maxTurns = getEnvInt("SHORT_TERM_MAX_TURNS");
  const lockTimeoutMs = getEnvInt("SESSION_LOCK_TIMEOUT_MS");
  const llmTimeoutMs = getEnvInt("LLM_TIMEOUT_MS");
  const maxTokens = getEnvInt("LLM_MAX_TOKENS");

  return {
    llm: {
      provider: parseProvider(getEnv("MODEL_PROVIDER") || getEnv("LLM_PROVIDER")),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      stubReply: getEnv("STUB_REPLY"),
    },
    memory: {
      longTermCapacity: getEnvInt("LONG_TERM_CAPACITY") ?? 5,
      retentionThresholdChars: getEnvInt("RETENTION_THRESHOLD_CHARS") ?? 20,
      shortTermMaxTurns: maxTurns !== undefined && maxTurns > 0 ? maxTurns : undefined,
      lockTimeoutMs: lockTimeoutMs !== undefined && lockTimeoutMs >= 0 ? lockTimeoutMs : undefined,
      retainAssistantReplies: getEnvFlag("RETAIN_ASSISTANT_REPLIES"),
    },
    chat: {
      llmTimeoutMs: llmTimeoutMs !== undefined && llmTimeoutMs > 0 ? llmTimeoutMs : 25_000,
      maxTokens: maxTokens !== undefined && maxTokens > 0 ? maxTokens : 256,
      systemPrompt: getEnv("SYSTEM_PROMPT"),
    },
  };
}

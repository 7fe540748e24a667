/**
 * Structured logging for the session memory service.
 * JSON lines with ISO timestamps; turn text is never logged, only lengths.
 *
 * Env:
 *   LOG_LEVEL  - debug | info | warn | error | silent (default: info, silent under Jest)
 *   LOG_FILE   - If set, also append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Extra destination file; defaults to LOG_FILE. */
  file?: string;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? fallback;
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL, isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
  file: process.env.LOG_FILE?.trim() || undefined,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = config.file ?? defaultConfig.file;

  const stdoutStream: pino.DestinationStream = pretty
    ? pino.transport({ target: "pino-pretty", options: { colorize: true } })
    : pino.destination(1);
  if (!logFile) {
    return pino(opts, stdoutStream);
  }
  return pino(
    opts,
    pino.multistream([{ stream: stdoutStream }, { stream: pino.destination({ dest: logFile, append: true, mkdir: true }) }])
  );
}

export const logger = createLogger();

/** Log LLM request/response (summary only). */
export function logLlmCall(log: pino.Logger, messageCount: number, responseLength: number, durationMs?: number): void {
  log.info({ event: "LLM_CALL", messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log a retention decision for one candidate. */
export function logRetention(log: pino.Logger, sessionId: string, accepted: boolean, textLength: number): void {
  log.debug(
    { event: accepted ? "FACT_RETAINED" : "FACT_REJECTED", sessionId, textLength },
    accepted ? "Fact retained" : "Candidate rejected by retention policy"
  );
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}

/**
 * Counters for memory activity and per-turn latency.
 * Counters live on the manager instance; turn metrics are logged as they arrive.
 */

import { logger } from "../logging";
import type { MemoryStats } from "../memory/types";

type MemoryCounter = Exclude<keyof MemoryStats, "activeSessions">;

export class MemoryMetrics {
  private counters: Record<MemoryCounter, number> = {
    sessionsCreated: 0,
    sessionsClosed: 0,
    turnsAppended: 0,
    factsRetained: 0,
    factsRejected: 0,
    factsEvicted: 0,
  };

  increment(counter: MemoryCounter, by = 1): void {
    this.counters[counter] += by;
  }

  snapshot(activeSessions: number): MemoryStats {
    return { ...this.counters, activeSessions };
  }
}

/** Last turn timing (ms). */
export interface TurnMetrics {
  /** Time spent waiting on the model. */
  llmLatencyMs?: number;
  /** Input received to reply committed to memory. */
  turnLatencyMs?: number;
  /** Session the turn belonged to. */
  sessionId?: string;
  /** Long-term facts present when the prompt was built. */
  longTermChars?: number;
  /** Short-term turns sent with the prompt. */
  historyTurns?: number;
  /** Whether the user input was retained as a fact. */
  retained?: boolean;
}

let lastTurnMetrics: TurnMetrics = {};

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...lastTurnMetrics, ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      llm_latency_ms: metrics.llmLatencyMs,
      turn_latency_ms: metrics.turnLatencyMs,
      session_id: metrics.sessionId,
      long_term_chars: metrics.longTermChars,
      history_turns: metrics.historyTurns,
      retained: metrics.retained,
    },
    "Turn latency"
  );
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

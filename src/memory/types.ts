/**
 * Session memory types.
 * Two tiers per session: verbatim short-term turns and a bounded list of long-term facts.
 */

import type { Logger } from "pino";

export type TurnRole = "user" | "assistant";

/** One role-tagged utterance. Frozen once created. */
export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
}

/** A retained long-term memory entry. */
export type Fact = string;

/**
 * Decides whether a piece of text qualifies for long-term retention.
 * May resolve asynchronously (e.g. embedding-based salience).
 */
export interface RetentionPolicy {
  accepts(turnText: string): boolean | Promise<boolean>;
}

export type RetentionPredicate = (turnText: string) => boolean | Promise<boolean>;

/** Identity of an open session. The same object is returned for every lookup of that id. */
export interface SessionHandle {
  readonly sessionId: string;
  /** Epoch ms when the session was created. */
  readonly createdAt: number;
}

/** Serializable view of one session, for a persistence backend. */
export interface SessionSnapshot {
  sessionId: string;
  turns: Turn[];
  facts: Fact[];
}

/**
 * Read/write view of one session handed to `withSession` callbacks.
 * Only valid while the callback runs; writes after that throw SessionViewReleasedError.
 */
export interface SessionView {
  readonly sessionId: string;
  appendTurn(turn: Turn): void;
  /** Applies the retention policy and resolves true when a fact was stored. */
  recordForLongTerm(candidateText: string, role?: TurnRole): Promise<boolean>;
  shortTerm(): readonly Turn[];
  longTerm(): string;
}

export interface SessionMemoryOptions {
  /** Max facts per session (default 5). Must be an integer >= 0. */
  longTermCapacity?: number;
  /** Baseline policy threshold: text longer than this many chars is retained (default 20). */
  retentionThresholdChars?: number;
  /** Replaces the baseline length policy. */
  retentionPolicy?: RetentionPolicy | RetentionPredicate;
  /** Cap on short-term turns per session; unbounded when unset. */
  shortTermMaxTurns?: number;
  /** Max wait for a busy session before failing with SessionBusyError; unbounded when unset. */
  lockTimeoutMs?: number;
  /** Extra caller-defined check on session ids, applied after the non-empty check. */
  validateSessionId?: (sessionId: string) => boolean;
  logger?: Logger;
}

export interface MemoryStats {
  sessionsCreated: number;
  sessionsClosed: number;
  activeSessions: number;
  turnsAppended: number;
  factsRetained: number;
  factsRejected: number;
  factsEvicted: number;
}

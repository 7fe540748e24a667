/**
 * SessionMemoryManager: sole owner and mutator of per-session short-term and long-term memory.
 *
 * Every operation on a session runs under that session's lock, so reads never observe a
 * half-applied append or eviction even when the retention policy is async. The session map
 * itself is only touched synchronously (lookup/insert), which keeps sessions independent.
 */

import type { Logger } from "pino";
import type {
  Fact,
  MemoryStats,
  RetentionPolicy,
  SessionHandle,
  SessionMemoryOptions,
  SessionSnapshot,
  SessionView,
  Turn,
  TurnRole,
} from "./types";
import { InvalidSessionIdError, SessionViewReleasedError } from "./errors";
import { SessionLock } from "./lock";
import { DEFAULT_LONG_TERM_CAPACITY, LongTermStore, assertValidCapacity } from "./long-term";
import { ShortTermBuffer, assertValidMaxTurns, createTurn } from "./short-term";
import { DEFAULT_RETENTION_THRESHOLD_CHARS, LengthRetentionPolicy, formatFact, toRetentionPolicy } from "./retention";
import { MemoryMetrics } from "../metrics";
import { logger as defaultLogger, logRetention } from "../logging";

interface SessionEntry {
  handle: SessionHandle;
  shortTerm: ShortTermBuffer;
  longTerm: LongTermStore;
  lock: SessionLock;
  /** Set under the lock by closeSession; work queued on a closed entry moves to its successor. */
  closed: boolean;
}

interface ViewScope {
  released: boolean;
}

type LockedOutcome<T> = { ran: true; value: T } | { ran: false };

export class SessionMemoryManager {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly capacity: number;
  private readonly policy: RetentionPolicy;
  private readonly shortTermMaxTurns: number | undefined;
  private readonly lockTimeoutMs: number | undefined;
  private readonly validateSessionId: ((sessionId: string) => boolean) | undefined;
  private readonly log: Logger;
  private readonly metrics = new MemoryMetrics();

  constructor(options: SessionMemoryOptions = {}) {
    this.capacity = options.longTermCapacity ?? DEFAULT_LONG_TERM_CAPACITY;
    assertValidCapacity(this.capacity);
    this.policy = options.retentionPolicy
      ? toRetentionPolicy(options.retentionPolicy)
      : new LengthRetentionPolicy(options.retentionThresholdChars ?? DEFAULT_RETENTION_THRESHOLD_CHARS);
    assertValidMaxTurns(options.shortTermMaxTurns);
    this.shortTermMaxTurns = options.shortTermMaxTurns;
    if (options.lockTimeoutMs !== undefined && !(options.lockTimeoutMs >= 0)) {
      throw new RangeError(`lockTimeoutMs must be >= 0 (got ${options.lockTimeoutMs})`);
    }
    this.lockTimeoutMs = options.lockTimeoutMs;
    this.validateSessionId = options.validateSessionId;
    this.log = options.logger ?? defaultLogger;
  }

  /** Return the session's handle, creating empty tiers on first reference. */
  getOrCreateSession(sessionId: string): SessionHandle {
    return this.entry(sessionId).handle;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<void> {
    await this.onSession(sessionId, (entry) => this.append(entry, turn));
  }

  /**
   * Evaluate the retention policy on candidateText; store it as a fact when accepted.
   * Resolves false (not an error) when the policy rejects it.
   */
  async recordForLongTerm(sessionId: string, candidateText: string, role: TurnRole = "user"): Promise<boolean> {
    return this.onSession(sessionId, (entry) => this.retain(entry, candidateText, role));
  }

  async renderShortTerm(sessionId: string): Promise<readonly Turn[]> {
    return this.onSession(sessionId, (entry) => entry.shortTerm.toArray());
  }

  async renderLongTerm(sessionId: string): Promise<string> {
    return this.onSession(sessionId, (entry) => entry.longTerm.render());
  }

  /**
   * Run several reads/writes on one session as a single critical section.
   * Do not await external I/O inside fn; other callers on this session wait for it.
   */
  async withSession<T>(sessionId: string, fn: (session: SessionView) => T | Promise<T>): Promise<T> {
    return this.onSession(sessionId, async (entry) => {
      const scope: ViewScope = { released: false };
      try {
        return await fn(this.view(entry, scope));
      } finally {
        scope.released = true;
      }
    });
  }

  /**
   * Drop a session's state once in-flight work on it has finished. Resolves false if it did not exist.
   * Operations queued behind the close run on a fresh session under the same id.
   */
  async closeSession(sessionId: string): Promise<boolean> {
    this.assertSessionId(sessionId);
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;
    return entry.lock.run(() => {
      if (entry.closed) return false;
      entry.closed = true;
      this.sessions.delete(sessionId);
      this.metrics.increment("sessionsClosed");
      this.log.info({ event: "SESSION_CLOSED", sessionId }, "Session closed");
      return true;
    });
  }

  async exportSession(sessionId: string): Promise<SessionSnapshot> {
    return this.onSession(sessionId, (entry) => ({
      sessionId,
      turns: [...entry.shortTerm.toArray()],
      facts: [...entry.longTerm.toArray()],
    }));
  }

  /** Load a snapshot into a session, replacing both tiers. Capacity and short-term cap still apply. */
  async restoreSession(snapshot: SessionSnapshot): Promise<SessionHandle> {
    const turns = snapshot.turns.map((t) => createTurn(t.role, t.text));
    return this.onSession(snapshot.sessionId, (entry) => {
      entry.shortTerm.replace(turns);
      entry.longTerm.replace(snapshot.facts);
      this.log.debug(
        { event: "SESSION_RESTORED", sessionId: snapshot.sessionId, turns: entry.shortTerm.size, facts: entry.longTerm.size },
        "Session restored from snapshot"
      );
      return entry.handle;
    });
  }

  getStats(): MemoryStats {
    return this.metrics.snapshot(this.sessions.size);
  }

  private entry(sessionId: string): SessionEntry {
    this.assertSessionId(sessionId);
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const entry: SessionEntry = {
      handle: Object.freeze({ sessionId, createdAt: Date.now() }),
      shortTerm: new ShortTermBuffer({ maxTurns: this.shortTermMaxTurns }),
      longTerm: new LongTermStore(this.capacity),
      lock: new SessionLock(sessionId, this.lockTimeoutMs),
      closed: false,
    };
    this.sessions.set(sessionId, entry);
    this.metrics.increment("sessionsCreated");
    this.log.info({ event: "SESSION_CREATED", sessionId }, "Session created");
    return entry;
  }

  private assertSessionId(sessionId: unknown): asserts sessionId is string {
    if (typeof sessionId !== "string") {
      throw new InvalidSessionIdError(sessionId, "must be a string");
    }
    if (sessionId.trim().length === 0) {
      throw new InvalidSessionIdError(sessionId, "must not be empty");
    }
    if (this.validateSessionId && !this.validateSessionId(sessionId)) {
      throw new InvalidSessionIdError(sessionId, "rejected by validator");
    }
  }

  /** Run fn under the session's lock, re-resolving the entry if it was closed while we waited. */
  private async onSession<T>(sessionId: string, fn: (entry: SessionEntry) => T | Promise<T>): Promise<T> {
    for (;;) {
      const entry = this.entry(sessionId);
      const outcome = await entry.lock.run(async (): Promise<LockedOutcome<T>> =>
        entry.closed ? { ran: false } : { ran: true, value: await fn(entry) }
      );
      if (outcome.ran) return outcome.value;
    }
  }

  // append and retain assume the caller holds entry.lock.
  private append(entry: SessionEntry, turn: Turn): void {
    entry.shortTerm.append(createTurn(turn.role, turn.text));
    this.metrics.increment("turnsAppended");
  }

  private async retain(
    entry: SessionEntry,
    candidateText: string,
    role: TurnRole,
    scope?: ViewScope
  ): Promise<boolean> {
    const { sessionId } = entry.handle;
    const accepted = await this.policy.accepts(candidateText);
    if (scope?.released) throw new SessionViewReleasedError(sessionId);
    logRetention(this.log, sessionId, accepted, candidateText.length);
    if (!accepted) {
      this.metrics.increment("factsRejected");
      return false;
    }
    const evicted: Fact[] = entry.longTerm.add(formatFact(role, candidateText));
    this.metrics.increment("factsRetained");
    if (evicted.length > 0) {
      this.metrics.increment("factsEvicted", evicted.length);
      this.log.debug({ event: "FACT_EVICTED", sessionId, count: evicted.length }, "Evicted oldest facts");
    }
    return true;
  }

  /** View for a withSession callback; writes throw once scope.released is set. */
  private view(entry: SessionEntry, scope: ViewScope): SessionView {
    const { sessionId } = entry.handle;
    const assertLive = (): void => {
      if (scope.released) throw new SessionViewReleasedError(sessionId);
    };
    return {
      sessionId,
      appendTurn: (turn) => {
        assertLive();
        this.append(entry, turn);
      },
      recordForLongTerm: async (candidateText, role = "user") => {
        assertLive();
        return this.retain(entry, candidateText, role, scope);
      },
      shortTerm: () => entry.shortTerm.toArray(),
      longTerm: () => entry.longTerm.render(),
    };
  }
}

/** Build a manager from the memory section of the app config. */
export function createSessionMemoryManager(
  config: {
    longTermCapacity: number;
    retentionThresholdChars: number;
    shortTermMaxTurns?: number;
    lockTimeoutMs?: number;
  },
  logger?: Logger
): SessionMemoryManager {
  return new SessionMemoryManager({ ...config, logger });
}

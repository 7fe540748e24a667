/**
 * Session memory: short-term turns, long-term facts, and the manager that owns both.
 */

export type {
  Turn,
  TurnRole,
  Fact,
  RetentionPolicy,
  RetentionPredicate,
  SessionHandle,
  SessionSnapshot,
  SessionView,
  SessionMemoryOptions,
  MemoryStats,
} from "./types";
export { SessionMemoryManager, createSessionMemoryManager } from "./manager";
export { ShortTermBuffer, createTurn } from "./short-term";
export { LongTermStore, DEFAULT_LONG_TERM_CAPACITY, FACT_DELIMITER } from "./long-term";
export { LengthRetentionPolicy, DEFAULT_RETENTION_THRESHOLD_CHARS, formatFact } from "./retention";
export {
  SessionMemoryError,
  InvalidSessionIdError,
  CapacityMisconfigurationError,
  SessionBusyError,
  SessionViewReleasedError,
} from "./errors";

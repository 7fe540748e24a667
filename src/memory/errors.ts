/**
 * Errors raised by the session memory manager.
 * A rejected retention candidate is not an error and has no class here.
 */

export type SessionMemoryErrorCode =
  | "INVALID_SESSION_ID"
  | "CAPACITY_MISCONFIGURATION"
  | "SESSION_BUSY"
  | "SESSION_VIEW_RELEASED";

export class SessionMemoryError extends Error {
  constructor(
    readonly code: SessionMemoryErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SessionMemoryError";
  }
}

export class InvalidSessionIdError extends SessionMemoryError {
  constructor(readonly sessionId: unknown, reason: string) {
    super("INVALID_SESSION_ID", `Invalid session id: ${reason}`);
    this.name = "InvalidSessionIdError";
  }
}

export class CapacityMisconfigurationError extends SessionMemoryError {
  constructor(readonly capacity: number) {
    super("CAPACITY_MISCONFIGURATION", `Long-term capacity must be an integer >= 0 (got ${capacity})`);
    this.name = "CapacityMisconfigurationError";
  }
}

/** Lock wait timed out. Safe to retry; nothing was mutated. */
export class SessionBusyError extends SessionMemoryError {
  constructor(
    readonly sessionId: string,
    readonly waitedMs: number
  ) {
    super("SESSION_BUSY", `Session ${sessionId} busy; lock not acquired within ${waitedMs}ms`);
    this.name = "SessionBusyError";
  }
}

/** A SessionView was written to after its withSession callback settled. */
export class SessionViewReleasedError extends SessionMemoryError {
  constructor(readonly sessionId: string) {
    super("SESSION_VIEW_RELEASED", `Session view for ${sessionId} used after withSession returned`);
    this.name = "SessionViewReleasedError";
  }
}

/**
 * Short-term buffer: verbatim turns in conversation order.
 * Unbounded unless maxTurns is set, in which case the oldest turns are dropped.
 */

import type { Turn, TurnRole } from "./types";

const TURN_ROLES: readonly TurnRole[] = ["user", "assistant"];

function isTurnRole(value: unknown): value is TurnRole {
  return TURN_ROLES.some((r) => r === value);
}

/** Create a frozen Turn. Throws TypeError on an unknown role or non-string text. */
export function createTurn(role: TurnRole, text: string): Turn {
  if (!isTurnRole(role)) throw new TypeError(`Unknown turn role: ${String(role)}`);
  if (typeof text !== "string") throw new TypeError("Turn text must be a string");
  return Object.freeze({ role, text });
}

export interface ShortTermBufferConfig {
  /** Max number of turns to keep; unbounded when unset. */
  maxTurns?: number;
}

export function assertValidMaxTurns(maxTurns: number | undefined): void {
  if (maxTurns !== undefined && (!Number.isInteger(maxTurns) || maxTurns < 1)) {
    throw new RangeError(`Short-term maxTurns must be a positive integer (got ${maxTurns})`);
  }
}

export class ShortTermBuffer {
  private turns: Turn[] = [];
  private readonly maxTurns: number | undefined;

  constructor(config: ShortTermBufferConfig = {}) {
    assertValidMaxTurns(config.maxTurns);
    this.maxTurns = config.maxTurns;
  }

  append(turn: Turn): void {
    this.turns.push(Object.isFrozen(turn) ? turn : createTurn(turn.role, turn.text));
    if (this.maxTurns === undefined) return;
    while (this.turns.length > this.maxTurns) {
      this.turns.shift();
    }
  }

  /** Copy of the buffer, oldest first. */
  toArray(): readonly Turn[] {
    return [...this.turns];
  }

  get size(): number {
    return this.turns.length;
  }

  /** Replace the contents (e.g. from a restored snapshot). Preserves the maxTurns trim. */
  replace(turns: readonly Turn[]): void {
    this.turns = [];
    for (const t of turns) this.append(t);
  }
}

/**
 * Retention policies: which text is worth keeping in long-term memory.
 * The manager only sees the RetentionPolicy interface.
 */

import type { Fact, RetentionPolicy, RetentionPredicate, TurnRole } from "./types";

export const DEFAULT_RETENTION_THRESHOLD_CHARS = 20;

/** Accepts text strictly longer than thresholdChars (UTF-16 length). */
export class LengthRetentionPolicy implements RetentionPolicy {
  constructor(readonly thresholdChars: number = DEFAULT_RETENTION_THRESHOLD_CHARS) {
    if (!Number.isFinite(thresholdChars)) {
      throw new RangeError(`Retention threshold must be a finite number (got ${thresholdChars})`);
    }
  }

  accepts(turnText: string): boolean {
    return turnText.length > this.thresholdChars;
  }
}

export function toRetentionPolicy(policy: RetentionPolicy | RetentionPredicate): RetentionPolicy {
  if (typeof policy === "function") {
    return { accepts: (turnText) => policy(turnText) };
  }
  return policy;
}

const FACT_PREFIX: Record<TurnRole, string> = {
  user: "User said: ",
  assistant: "Assistant said: ",
};

export function formatFact(role: TurnRole, text: string): Fact {
  return `${FACT_PREFIX[role]}${text}`;
}

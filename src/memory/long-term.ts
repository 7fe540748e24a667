/**
 * Long-term store: capacity-bounded facts, oldest evicted first.
 */

import type { Fact } from "./types";
import { CapacityMisconfigurationError } from "./errors";

export const DEFAULT_LONG_TERM_CAPACITY = 5;
export const FACT_DELIMITER = ". ";

export function assertValidCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new CapacityMisconfigurationError(capacity);
  }
}

export class LongTermStore {
  private facts: Fact[] = [];

  constructor(readonly capacity: number = DEFAULT_LONG_TERM_CAPACITY) {
    assertValidCapacity(capacity);
  }

  /**
   * Append a fact, then evict from the front while over capacity.
   * Returns the evicted facts, oldest first.
   */
  add(fact: Fact): Fact[] {
    this.facts.push(fact);
    const evicted: Fact[] = [];
    while (this.facts.length > this.capacity) {
      const oldest = this.facts.shift();
      if (oldest !== undefined) evicted.push(oldest);
    }
    return evicted;
  }

  toArray(): readonly Fact[] {
    return [...this.facts];
  }

  get size(): number {
    return this.facts.length;
  }

  /** Facts joined in retention order; empty string when there are none. */
  render(): string {
    return this.facts.join(FACT_DELIMITER);
  }

  replace(facts: readonly Fact[]): void {
    this.facts = [];
    for (const f of facts) this.add(f);
  }
}

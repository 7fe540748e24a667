/**
 * Unit tests for the long-term store and its FIFO eviction.
 */

import { LongTermStore } from "../../../src/memory/long-term";
import { CapacityMisconfigurationError } from "../../../src/memory/errors";

describe("LongTermStore", () => {
  it("defaults to capacity 5", () => {
    expect(new LongTermStore().capacity).toBe(5);
  });

  it("evicts oldest first and keeps order", () => {
    const store = new LongTermStore(5);
    const evicted: string[] = [];
    for (let i = 1; i <= 7; i++) evicted.push(...store.add(`f${i}`));
    expect(evicted).toEqual(["f1", "f2"]);
    expect(store.render()).toBe("f3. f4. f5. f6. f7");
  });

  it("renders empty string when there are no facts", () => {
    expect(new LongTermStore().render()).toBe("");
  });

  it("keeps nothing at capacity 0", () => {
    const store = new LongTermStore(0);
    expect(store.add("only")).toEqual(["only"]);
    expect(store.size).toBe(0);
    expect(store.render()).toBe("");
  });

  it("replace applies capacity", () => {
    const store = new LongTermStore(2);
    store.replace(["a", "b", "c"]);
    expect(store.toArray()).toEqual(["b", "c"]);
  });

  it("throws CapacityMisconfigurationError for negative or fractional capacity", () => {
    expect(() => new LongTermStore(-1)).toThrow(CapacityMisconfigurationError);
    expect(() => new LongTermStore(1.5)).toThrow(CapacityMisconfigurationError);
  });
});

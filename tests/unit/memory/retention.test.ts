/**
 * Unit tests for retention policies and fact formatting.
 */

import { LengthRetentionPolicy, formatFact, toRetentionPolicy } from "../../../src/memory/retention";

describe("LengthRetentionPolicy", () => {
  const policy = new LengthRetentionPolicy();

  it("rejects exactly 20 characters", () => {
    expect(policy.accepts("12345678901234567890")).toBe(false);
  });

  it("accepts 21 characters", () => {
    expect(policy.accepts("123456789012345678901")).toBe(true);
  });

  it("uses a custom threshold", () => {
    const p = new LengthRetentionPolicy(3);
    expect(p.accepts("abc")).toBe(false);
    expect(p.accepts("abcd")).toBe(true);
  });

  it("rejects a non-finite threshold", () => {
    expect(() => new LengthRetentionPolicy(Number.NaN)).toThrow(RangeError);
  });
});

describe("toRetentionPolicy", () => {
  it("wraps a predicate", async () => {
    const p = toRetentionPolicy((text) => text.startsWith("!"));
    expect(await p.accepts("!keep")).toBe(true);
    expect(await p.accepts("drop")).toBe(false);
  });

  it("passes a policy object through", () => {
    const policy = new LengthRetentionPolicy(1);
    expect(toRetentionPolicy(policy)).toBe(policy);
  });
});

describe("formatFact", () => {
  it("prefixes by role", () => {
    expect(formatFact("user", "I like tea")).toBe("User said: I like tea");
    expect(formatFact("assistant", "Noted")).toBe("Assistant said: Noted");
  });
});

import { MemoryMetrics, getLastTurnMetrics, recordTurnMetrics } from "../../../src/metrics";

describe("MemoryMetrics", () => {
  it("counts per instance and reports active sessions", () => {
    const m = new MemoryMetrics();
    m.increment("sessionsCreated");
    m.increment("factsEvicted", 2);
    expect(m.snapshot(1)).toEqual({
      sessionsCreated: 1,
      sessionsClosed: 0,
      activeSessions: 1,
      turnsAppended: 0,
      factsRetained: 0,
      factsRejected: 0,
      factsEvicted: 2,
    });
    expect(new MemoryMetrics().snapshot(0).factsEvicted).toBe(0);
  });
});

describe("recordTurnMetrics", () => {
  it("merges into the last turn metrics", () => {
    recordTurnMetrics({ sessionId: "s", llmLatencyMs: 12 });
    recordTurnMetrics({ retained: true });
    expect(getLastTurnMetrics()).toMatchObject({ sessionId: "s", llmLatencyMs: 12, retained: true });
  });
});

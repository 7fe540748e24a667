/**
 * Unit tests for the per-session lock.
 */

import { SessionLock } from "../../../src/memory/lock";
import { SessionBusyError } from "../../../src/memory/errors";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SessionLock", () => {
  it("runs holders one at a time in call order", async () => {
    const lock = new SessionLock("s");
    const log: string[] = [];
    const gate = deferred();
    const first = lock.run(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = lock.run(() => {
      log.push("second");
    });
    await new Promise((r) => setImmediate(r));
    expect(log).toEqual(["first:start"]);
    expect(lock.pending).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
    expect(lock.pending).toBe(0);
  });

  it("releases the lock when fn throws", async () => {
    const lock = new SessionLock("s");
    await expect(lock.run(() => { throw new Error("boom"); })).rejects.toThrow("boom");
    await expect(lock.run(() => 42)).resolves.toBe(42);
  });

  it("rejects with SessionBusyError when the wait exceeds the timeout", async () => {
    const lock = new SessionLock("busy", 10);
    const gate = deferred();
    const holder = lock.run(() => gate.promise);
    const fn = jest.fn();
    await expect(lock.run(fn)).rejects.toBeInstanceOf(SessionBusyError);
    expect(fn).not.toHaveBeenCalled();
    gate.resolve();
    await holder;
    await expect(lock.run(() => "after")).resolves.toBe("after");
  });

  it("acquires an idle lock even with a zero timeout", async () => {
    const lock = new SessionLock("idle", 0);
    await expect(lock.run(() => "ok")).resolves.toBe("ok");
  });
});

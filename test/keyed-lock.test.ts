import { describe, expect, it } from "vitest";
import { KeyedLock } from "../src/keyed-lock";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs callers on the same key one at a time, in order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();
    const first = lock.run("a", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.run("a", async () => {
      events.push("second:start");
    });
    await new Promise((r) => setTimeout(r, 10));
    expect(events).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("does not block callers on other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run("a", () => gate.promise);
    await expect(lock.run("b", async () => "done")).resolves.toBe("done");
    expect(lock.isLocked("a")).toBe(true);
    gate.resolve();
    await blocked;
  });

  it("releases the key when the holder throws", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.run("a", async () => 42)).resolves.toBe(42);
    expect(lock.isLocked("a")).toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import { Mutex } from "../../../domain/index.js";

describe("Mutex", () => {
  it("should run sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const slow = mutex.runExclusive(async () => {
      order.push("a:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("a:end");
    });
    const fast = mutex.runExclusive(() => {
      order.push("b");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
  });

  it("should release the lock when a section throws", async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(await mutex.runExclusive(() => 7)).toBe(7);
    expect(mutex.queued).toBe(0);
  });
});

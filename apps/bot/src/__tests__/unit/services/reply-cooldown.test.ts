import { describe, it, expect } from "vitest";
import { ReplyCooldown } from "../../../services/reply-cooldown.js";

const T = 1_700_000_000_000;

describe("ReplyCooldown", () => {
  it("should skip a repeat inside the window", async () => {
    const replies = new ReplyCooldown(5_000);

    expect(await replies.tryAcquire("help:1", T)).toBe(true);
    expect(await replies.tryAcquire("help:1", T + 4_999)).toBe(false);
    expect(await replies.tryAcquire("help:1", T + 5_000)).toBe(true);
  });

  it("should not extend the window on a skipped repeat", async () => {
    const replies = new ReplyCooldown(5_000);

    await replies.tryAcquire("help:1", T);
    await replies.tryAcquire("help:1", T + 3_000);
    expect(await replies.tryAcquire("help:1", T + 5_000)).toBe(true);
  });

  it("should track keys independently", async () => {
    const replies = new ReplyCooldown(5_000);

    await replies.tryAcquire("help:1", T);
    expect(await replies.tryAcquire("help:2", T)).toBe(true);
    expect(await replies.size()).toBe(2);
  });

  it("should forget everything on clear", async () => {
    const replies = new ReplyCooldown(5_000);

    await replies.tryAcquire("help:1", T);
    await replies.clear();

    expect(await replies.size()).toBe(0);
    expect(await replies.tryAcquire("help:1", T + 1)).toBe(true);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { DeliveryTally, Recipient } from "../../../domain/broadcast/index.js";
import type { Sleep } from "../../../domain/utils/index.js";
import type { PgliteRepository } from "../../../repository/pglite.js";
import { BroadcastEngine } from "../../../services/broadcast-engine.js";
import { MockTransport } from "../../../transport/mock-transport.js";
import { addUsers, openTestRepository } from "../../../../test/fixtures.js";

describe("BroadcastEngine", () => {
  let repository: PgliteRepository;
  let transport: MockTransport;
  let sleep: Mock<Sleep>;

  async function prepare(userCount: number): Promise<{ broadcastId: number; recipients: Recipient[] }> {
    await addUsers(repository, 100, userCount);
    const broadcastId = await repository.createBroadcast({
      title: null,
      content: { kind: "text", text: "Оголошення" },
      createdByTgId: 1000,
    });
    await repository.createDeliveriesForBroadcast(broadcastId);
    return { broadcastId, recipients: await repository.getQueuedDeliveries(broadcastId) };
  }

  function engine(progressEvery = 10): BroadcastEngine {
    return new BroadcastEngine(transport, repository, { delayMs: 50, progressEvery, sleep });
  }

  beforeEach(async () => {
    repository = await openTestRepository();
    transport = new MockTransport();
    sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await repository.close();
  });

  it("should attempt every recipient exactly once, in snapshot order", async () => {
    const { broadcastId, recipients } = await prepare(4);

    const report = await engine().run({ broadcastId, content: { kind: "text", text: "Оголошення" } }, recipients);

    expect(transport.callsOf("sendText").map((c) => c.chatId)).toEqual([100, 101, 102, 103]);
    expect(report).toEqual({ total: 4, sent: 4, blocked: 0, failed: 0, successRatio: 1 });
    expect(await repository.countDeliveriesByStatus(broadcastId)).toEqual({ queued: 0, sent: 4, blocked: 0, failed: 0 });
  });

  it("should pause after every attempt", async () => {
    const { broadcastId, recipients } = await prepare(3);
    transport.failDeliveryTo(101, "transient");

    await engine().run({ broadcastId, content: { kind: "text", text: "x" } }, recipients);

    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(50);
  });

  it("should block a recipient who blocked the bot and keep going", async () => {
    const { broadcastId, recipients } = await prepare(3);
    transport.failDeliveryTo(101, "forbidden");

    const report = await engine().run({ broadcastId, content: { kind: "text", text: "x" } }, recipients);

    expect(report).toEqual({ total: 3, sent: 2, blocked: 1, failed: 0, successRatio: 2 / 3 });
    const blocked = await repository.getUserByExternalId(101);
    expect(blocked?.isBlocked).toBe(true);
    expect(blocked?.isActive).toBe(false);
    expect((await repository.getAdminStats(new Date())).totalUnsubscriptions).toBe(1);
  });

  it("should count other failures without retrying or blocking", async () => {
    const { broadcastId, recipients } = await prepare(2);
    transport.failDeliveryTo(100, "transient", "429");

    const report = await engine().run({ broadcastId, content: { kind: "text", text: "x" } }, recipients);

    expect(report.failed).toBe(1);
    expect(report.sent).toBe(1);
    expect((await repository.getUserByExternalId(100))?.isBlocked).toBe(false);
    expect(await repository.countDeliveriesByStatus(broadcastId)).toEqual({ queued: 0, sent: 1, blocked: 0, failed: 1 });
  });

  it("should send photos with their caption", async () => {
    const { broadcastId, recipients } = await prepare(1);

    await engine().run({ broadcastId, content: { kind: "photo", fileId: "photo-9", caption: "Квартира" } }, recipients);

    expect(transport.callsOf("sendPhoto")).toEqual([
      { method: "sendPhoto", chatId: 100, fileId: "photo-9", caption: "Квартира", options: undefined, messageId: 1 },
    ]);
  });

  it("should report progress after every N processed recipients", async () => {
    const { broadcastId, recipients } = await prepare(7);
    const progress: DeliveryTally[] = [];

    await engine(3).run({ broadcastId, content: { kind: "text", text: "x" } }, recipients, async (tally) => {
      progress.push(tally);
    });

    expect(progress).toEqual([
      { total: 7, sent: 3, blocked: 0, failed: 0 },
      { total: 7, sent: 6, blocked: 0, failed: 0 },
    ]);
  });

  it("should keep going when a progress update fails", async () => {
    const { broadcastId, recipients } = await prepare(4);
    const onProgress = vi.fn().mockRejectedValue(new Error("message to edit not found"));

    const report = await engine(2).run({ broadcastId, content: { kind: "text", text: "x" } }, recipients, onProgress);

    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(report.sent).toBe(4);
  });

  it("should keep going when delivery bookkeeping fails", async () => {
    const { broadcastId, recipients } = await prepare(2);
    vi.spyOn(repository, "updateDeliveryStatus").mockRejectedValue(new Error("connection terminated"));

    const report = await engine().run({ broadcastId, content: { kind: "text", text: "x" } }, recipients);

    expect(report.sent).toBe(2);
    expect(transport.callsOf("sendText")).toHaveLength(2);
  });

  it("should finish an empty snapshot immediately", async () => {
    const report = await engine().run({ broadcastId: 1, content: { kind: "text", text: "x" } }, []);
    expect(report).toEqual({ total: 0, sent: 0, blocked: 0, failed: 0, successRatio: 0 });
    expect(sleep).not.toHaveBeenCalled();
  });
});

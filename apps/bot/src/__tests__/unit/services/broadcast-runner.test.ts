import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { BroadcastContent } from "../../../domain/broadcast/index.js";
import { MockTimeProvider, type Sleep } from "../../../domain/utils/index.js";
import type { PgliteRepository } from "../../../repository/pglite.js";
import { BroadcastEngine } from "../../../services/broadcast-engine.js";
import { BroadcastRunner, statsFromCounts, type BroadcastStatusView } from "../../../services/broadcast-runner.js";
import { MockTransport } from "../../../transport/mock-transport.js";
import { addUsers, openTestRepository } from "../../../../test/fixtures.js";

const ADMIN_CHAT = 1000;
const content: BroadcastContent = { kind: "text", text: "Нові оголошення" };

const view: BroadcastStatusView = {
  started: (recipients) => `started:${recipients}`,
  progress: (tally) => `progress:${tally.sent}`,
  finished: (report) => `finished:${report.sent}/${report.total}`,
};

describe("BroadcastRunner", () => {
  let repository: PgliteRepository;
  let transport: MockTransport;
  let time: MockTimeProvider;
  let release: () => void;
  let sleep: Sleep;

  function createRunner(): BroadcastRunner {
    const engine = new BroadcastEngine(transport, repository, { delayMs: 0, progressEvery: 10, sleep });
    return new BroadcastRunner(repository, transport, engine, view, time);
  }

  beforeEach(async () => {
    repository = await openTestRepository();
    transport = new MockTransport();
    time = new MockTimeProvider(Date.UTC(2026, 2, 1, 12, 0, 0));
    release = () => {};
    sleep = async () => {};
  });

  afterEach(async () => {
    await repository.close();
  });

  /** Deliveries hang on their first pause until release() */
  function holdDeliveries(): void {
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    sleep = () => gate;
  }

  it("should refuse to start without recipients", async () => {
    const runner = createRunner();

    const result = await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });

    expect(result).toEqual({ status: "no_recipients" });
    expect(await repository.listBroadcastsByStatus("draft")).toEqual([]);
    expect(runner.isRunning).toBe(false);
  });

  it("should run to completion and record stats", async () => {
    await addUsers(repository, 100, 3);
    const runner = createRunner();

    const result = await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });
    expect(result.status).toBe("started");
    expect(await runner.drain(1_000)).toBe(true);

    const [completed] = await repository.listBroadcastsByStatus("completed");
    expect(completed?.stats).toEqual({ total: 3, sent: 3, blocked: 0, failed: 0, successRatio: 1 });
    expect(completed?.startedAt?.getTime()).toBe(time.now());

    const metrics = await repository.getDailyMetrics("2026-03-01");
    expect(metrics?.sentMessages).toBe(3);
    expect(metrics?.errorsCount).toBe(0);
    expect(runner.isRunning).toBe(false);
  });

  it("should post a status message and edit it into the summary", async () => {
    await addUsers(repository, 100, 2);
    const runner = createRunner();

    await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });
    await runner.drain(1_000);

    const [status] = transport.callsOf("sendText");
    expect(status).toMatchObject({ chatId: ADMIN_CHAT, text: "started:2", messageId: 1 });
    expect(transport.callsOf("editText").at(-1)).toMatchObject({
      chatId: ADMIN_CHAT,
      messageId: 1,
      text: "finished:2/2",
    });
  });

  it("should send the summary as a new message when the status message failed", async () => {
    await addUsers(repository, 100, 1);
    transport.failDeliveryTo(ADMIN_CHAT, "transient");
    const runner = createRunner();

    await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });
    await runner.drain(1_000);

    expect(transport.callsOf("editText")).toEqual([]);
    expect(await repository.listBroadcastsByStatus("completed")).toHaveLength(1);
  });

  it("should report busy while a run is active", async () => {
    await addUsers(repository, 100, 2);
    holdDeliveries();
    const runner = createRunner();

    const first = await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });
    const second = await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });

    expect(second).toEqual({ status: "busy" });
    expect(runner.isRunning).toBe(true);
    expect(first.status === "started" && runner.activeBroadcastId === first.broadcastId).toBe(true);

    release();
    expect(await runner.drain(1_000)).toBe(true);
    expect(runner.activeBroadcastId).toBeNull();
  });

  it("should report a drain timeout while deliveries are held", async () => {
    await addUsers(repository, 100, 1);
    holdDeliveries();
    const runner = createRunner();

    await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });
    expect(await runner.drain(10)).toBe(false);

    release();
    expect(await runner.drain(1_000)).toBe(true);
  });

  it("should drain immediately when idle", async () => {
    expect(await createRunner().drain(0)).toBe(true);
  });

  it("should mark the broadcast interrupted when completion fails", async () => {
    await addUsers(repository, 100, 2);
    vi.spyOn(repository, "completeBroadcast").mockRejectedValueOnce(new Error("disk I/O error"));
    const runner = createRunner();

    await runner.start({ adminTgId: ADMIN_CHAT, chatId: ADMIN_CHAT, content });
    await runner.drain(1_000);

    const [interrupted] = await repository.listBroadcastsByStatus("interrupted");
    expect(interrupted?.stats).toEqual({ total: 2, sent: 2, blocked: 0, failed: 0, successRatio: 1 });
    expect(runner.isRunning).toBe(false);
  });
});

describe("statsFromCounts", () => {
  it("should count queued rows in the total but not in the ratio", () => {
    expect(statsFromCounts({ queued: 2, sent: 3, blocked: 1, failed: 0 })).toEqual({
      total: 6,
      sent: 3,
      blocked: 1,
      failed: 0,
      successRatio: 0.75,
    });
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createBotCore, type BotCore, type BotCoreSettings } from "../../../bot/index.js";
import { callbackEvent, classifyMessage, type Sender } from "../../../bot/events.js";
import {
  CALLBACKS,
  cityCallback,
  cityChannelKeyboard,
  citiesKeyboard,
  mainMenuKeyboard,
  subscriptionKeyboard,
} from "../../../bot/keyboards.js";
import { createTexts, MENU_LABELS, type Branding } from "../../../bot/texts.js";
import { MockTimeProvider } from "../../../domain/utils/index.js";
import type { PgliteRepository } from "../../../repository/pglite.js";
import { MockTransport } from "../../../transport/mock-transport.js";
import { openTestRepository } from "../../../../test/fixtures.js";

const ADMIN = 1000;
const USER = 7;

const brand: Branding = {
  mainChannel: "@nestfinder_test",
  mainChannelLink: "https://t.me/nestfinder_test",
  adminContact: "test_admin",
};
const texts = createTexts(brand);

function settings(adminId: number = ADMIN): BotCoreSettings {
  return {
    adminId,
    brand,
    rateLimit: { threshold: 5, windowMs: 10_000, cooldownMs: 2_000 },
    subscriptionTtlMs: 300_000,
    broadcast: { delayMs: 0, progressEvery: 10, sleep: async () => {} },
  };
}

describe("Dispatcher", () => {
  let repository: PgliteRepository;
  let transport: MockTransport;
  let time: MockTimeProvider;
  let core: BotCore;
  let callbackCounter: number;

  const sender = (id: number): Sender => ({ id, username: `user${id}`, firstName: "Іван" });
  const say = (id: number, text: string) => core.dispatcher.dispatch(classifyMessage(id, sender(id), { text }));
  const press = (id: number, data: string, messageId: number = 10) => {
    callbackCounter++;
    return core.dispatcher.dispatch(callbackEvent(id, sender(id), `cb-${callbackCounter}`, data, messageId));
  };
  /** Step past the cooldown while staying well below the threshold */
  const later = () => time.advanceBy(3_000);

  beforeEach(async () => {
    repository = await openTestRepository();
    transport = new MockTransport();
    time = new MockTimeProvider(1_700_000_000_000);
    core = createBotCore(repository, transport, settings(), time);
    callbackCounter = 0;
  });

  afterEach(async () => {
    await core.runner.drain(1_000);
    await repository.close();
  });

  describe("start", () => {
    it("should greet with the main menu and register the user", async () => {
      expect(await say(USER, "/start poster")).toBe("handled");

      expect(transport.callsOf("sendText")).toEqual([
        {
          method: "sendText",
          chatId: USER,
          text: texts.welcome("Іван"),
          options: { keyboard: mainMenuKeyboard() },
          messageId: 1,
        },
      ]);
      const user = await repository.getUserByExternalId(USER);
      expect(user?.username).toBe("user7");
      expect(user?.utmSource).toBe("poster");
    });

    it("should still reply when the user upsert fails", async () => {
      vi.spyOn(repository, "saveUser").mockRejectedValueOnce(new Error("connection terminated"));
      expect(await say(USER, "/start")).toBe("handled");
      expect(transport.lastText()).toBe(texts.welcome("Іван"));
    });
  });

  describe("rate limiting", () => {
    it("should drop a message inside the cooldown without replying", async () => {
      await say(USER, "/start");
      expect(await say(USER, "привіт")).toBe("rate_limited");
      expect(transport.callsOf("sendText")).toHaveLength(1);
    });

    it("should limit the admin like any other sender", async () => {
      const outcomes: string[] = [];
      for (let i = 0; i < 4; i++) {
        outcomes.push(await say(ADMIN, "/start"));
      }
      expect(outcomes).toEqual(["handled", "rate_limited", "rate_limited", "rate_limited"]);
      expect(transport.callsOf("sendText")).toHaveLength(1);
    });

    it("should block the admin after the threshold until caches are cleared", async () => {
      for (let i = 0; i < 5; i++) {
        expect(await say(ADMIN, "/start")).toBe("handled");
        time.advanceBy(2_000);
      }
      expect(await say(ADMIN, "/start")).toBe("rate_limited");
      expect(await core.limiter.isBlocked(ADMIN)).toBe(true);

      // Admin routes outside the gate still work, so the block can be lifted
      expect(await press(ADMIN, CALLBACKS.adminClearCache)).toBe("handled");
      expect(await say(ADMIN, "/start")).toBe("handled");
    });

    it("should never limit callbacks", async () => {
      await say(USER, "/start");
      expect(await press(USER, CALLBACKS.backToMenu)).toBe("handled");
    });

    it("should let a spam-blocked user back in after the admin clears caches", async () => {
      const outcomes: string[] = [];
      for (let i = 0; i < 6; i++) {
        outcomes.push(await say(USER, "/start"));
        time.advanceBy(2_000);
      }
      expect(outcomes).toEqual(["handled", "handled", "handled", "handled", "handled", "rate_limited"]);
      expect(await core.limiter.isBlocked(USER)).toBe(true);

      expect(await press(ADMIN, CALLBACKS.adminClearCache)).toBe("handled");
      expect(transport.callsOf("answerCallback").at(-1)).toEqual({
        method: "answerCallback",
        callbackId: "cb-1",
        text: texts.alerts.cacheCleared,
        options: { alert: true },
      });
      expect(await core.limiter.stats()).toEqual({ trackedUsers: 0, blockedUsers: 0 });
      expect(await core.subscriptions.size()).toBe(0);

      expect(await say(USER, "/start")).toBe("handled");
    });
  });

  describe("admin guard", () => {
    it("should answer /admin from a non-admin as an unknown command and keep the session", async () => {
      await core.sessions.enter(USER, "awaiting_city", { selectedCityCode: "lviv" });

      expect(await say(USER, "/admin")).toBe("denied");

      expect(transport.calls).toEqual([
        { method: "sendText", chatId: USER, text: texts.unknownCommand, options: undefined, messageId: 1 },
      ]);
      expect(await core.sessions.get(USER)).toEqual({
        state: "awaiting_city",
        payload: { selectedCityCode: "lviv" },
      });
      expect(await repository.getUserByExternalId(USER)).toBeNull();
    });

    it("should reject /stats from a non-admin", async () => {
      expect(await say(USER, "/stats")).toBe("denied");
      expect(transport.lastText()).toBe(texts.unknownCommand);
    });

    it("should alert a non-admin pressing an admin button", async () => {
      expect(await press(USER, CALLBACKS.adminBroadcast)).toBe("denied");

      expect(transport.calls).toEqual([
        { method: "answerCallback", callbackId: "cb-1", text: texts.alerts.noAccess, options: { alert: true } },
      ]);
      expect((await core.sessions.get(USER)).state).toBe("idle");
    });

    it("should silently ignore a broadcast body from a non-admin", async () => {
      await core.sessions.enter(USER, "awaiting_broadcast_body");

      expect(await say(USER, "купуйте")).toBe("denied");

      expect(transport.calls).toEqual([]);
      expect(await repository.listBroadcastsByStatus("draft")).toEqual([]);
      expect(await repository.listBroadcastsByStatus("running")).toEqual([]);
    });

    it("should treat everyone as a non-admin when no admin is configured", async () => {
      core = createBotCore(repository, transport, settings(0), time);
      expect(await say(ADMIN, "/admin")).toBe("denied");
    });
  });

  describe("help", () => {
    const helpReplies = () => transport.callsOf("sendText").filter((c) => c.text === texts.help);

    it("should skip a repeated help request inside five seconds", async () => {
      expect(await say(USER, "/help")).toBe("handled");
      later();
      expect(await say(USER, MENU_LABELS.help)).toBe("handled");
      expect(helpReplies()).toHaveLength(1);

      time.advanceBy(2_000);
      await say(USER, MENU_LABELS.help);
      expect(helpReplies()).toHaveLength(2);
    });

    it("should answer again once the admin clears caches", async () => {
      await say(USER, "/help");
      await press(ADMIN, CALLBACKS.adminClearCache);
      later();

      await say(USER, "/help");
      expect(helpReplies()).toHaveLength(2);
    });

    it("should count remembered help replies on /stats", async () => {
      await say(USER, "/help");
      await say(ADMIN, "/stats");

      expect(transport.lastText()).toBe(
        texts.runtimeStats({ users: 2, availableCities: 4, spamBlocked: 0, subscriptionCache: 0, replyCache: 1, sessions: 0 })
      );
    });
  });

  describe("admin", () => {
    it("should open the admin panel", async () => {
      expect(await say(ADMIN, "/admin")).toBe("handled");

      expect(transport.lastText()).toBe(texts.adminPanel(1, 4, new Date(time.now())));
      expect((await core.sessions.get(ADMIN)).state).toBe("admin_menu");
    });

    it("should show runtime counters on /stats", async () => {
      await say(USER, "/start");
      await say(ADMIN, "/stats");

      expect(transport.lastText()).toBe(
        texts.runtimeStats({ users: 2, availableCities: 4, spamBlocked: 0, subscriptionCache: 0, replyCache: 0, sessions: 0 })
      );
    });

    it("should run a broadcast composed after the broadcast button", async () => {
      await say(USER, "/start");
      await say(ADMIN, "/admin");

      expect(await press(ADMIN, CALLBACKS.adminBroadcast, 5)).toBe("handled");
      expect(transport.callsOf("editText").at(-1)).toMatchObject({ messageId: 5, text: texts.broadcastPrompt(2) });
      expect((await core.sessions.get(ADMIN)).state).toBe("awaiting_broadcast_body");

      expect(await say(ADMIN, "Нові квартири")).toBe("handled");
      expect(await core.runner.drain(1_000)).toBe(true);

      const delivered = transport.callsOf("sendText").filter((c) => c.text === "Нові квартири");
      expect(delivered.map((c) => c.chatId)).toEqual([USER, ADMIN]);
      const [completed] = await repository.listBroadcastsByStatus("completed");
      expect(completed?.stats).toEqual({ total: 2, sent: 2, blocked: 0, failed: 0, successRatio: 1 });
      expect((await core.sessions.get(ADMIN)).state).toBe("idle");
    });

    it("should keep waiting when the broadcast body is empty", async () => {
      await core.sessions.enter(ADMIN, "awaiting_broadcast_body");

      await core.dispatcher.dispatch(classifyMessage(ADMIN, sender(ADMIN), {}));

      expect(transport.lastText()).toBe(texts.broadcastEmpty);
      expect((await core.sessions.get(ADMIN)).state).toBe("awaiting_broadcast_body");
    });

    it("should show extended stats with the top cities", async () => {
      await say(USER, "/start");
      await repository.updateUserCity(USER, "lviv", "Львів");

      await press(ADMIN, CALLBACKS.adminStats);

      const text = transport.callsOf("editText").at(-1)?.text ?? "";
      expect(text.endsWith("🔥 <b>Топ міст (30 днів):</b>\n1. Львів: <b>1</b>")).toBe(true);
    });
  });

  describe("city selection", () => {
    it("should ask for a subscription, then deliver the channel once subscribed", async () => {
      await say(USER, MENU_LABELS.chooseCity);
      expect(transport.callsOf("sendText")[0]?.options).toEqual({
        keyboard: citiesKeyboard(await repository.listAvailableCities()),
      });
      expect((await core.sessions.get(USER)).state).toBe("awaiting_city");

      later();
      await say(USER, "львів");
      expect(transport.callsOf("sendText").at(-1)).toMatchObject({
        text: texts.subscriptionPrompt("Львів"),
        options: { keyboard: subscriptionKeyboard(brand) },
      });
      expect((await core.sessions.get(USER)).payload).toEqual({
        selectedCityCode: "lviv",
        selectedCityName: "Львів",
      });

      // The negative answer is cached until the TTL runs out
      transport.setMembership(USER, "member");
      await press(USER, CALLBACKS.checkSubscription);
      expect(transport.callsOf("answerCallback").at(-1)).toMatchObject({
        text: texts.alerts.subscriptionMissing,
        options: { alert: true },
      });

      time.advanceBy(300_001);
      await press(USER, CALLBACKS.checkSubscription, 42);

      expect(transport.callsOf("editText").at(-1)).toEqual({
        method: "editText",
        chatId: USER,
        messageId: 42,
        text: texts.channelDelivered("Львів"),
        options: {
          keyboard: cityChannelKeyboard(brand, texts.channelButton("Львів"), "https://t.me/test_lviv"),
        },
      });
      expect(transport.callsOf("answerCallback").at(-1)).toEqual({
        method: "answerCallback",
        callbackId: "cb-2",
        text: texts.alerts.subscriptionConfirmed,
        options: undefined,
      });
      expect((await repository.getUserByExternalId(USER))?.lastCity).toBe("Львів");
      expect(await core.sessions.get(USER)).toEqual({ state: "idle", payload: {} });
    });

    it("should explain unknown and unavailable cities and keep waiting", async () => {
      transport.setMembership(USER, "member");
      await say(USER, MENU_LABELS.chooseCity);

      later();
      await say(USER, "ужгород");
      expect(transport.lastText()).toBe(texts.cityUnavailable("Ужгород"));

      later();
      await say(USER, "варшава");
      expect(transport.lastText()).toBe(texts.cityNotFound("варшава"));
      expect((await core.sessions.get(USER)).state).toBe("awaiting_city");

      later();
      await say(USER, "  Київ ");
      expect(transport.lastText()).toBe(texts.channelDelivered("Київ"));
      expect((await core.sessions.get(USER)).state).toBe("idle");
    });

    it("should deliver the channel straight from a city button for a subscriber", async () => {
      transport.setMembership(USER, "member");

      await press(USER, cityCallback("kyiv"), 9);

      expect(transport.callsOf("editText")).toHaveLength(1);
      expect(transport.lastText()).toBe(texts.channelDelivered("Київ"));
      expect(transport.callsOf("answerCallback")).toEqual([
        { method: "answerCallback", callbackId: "cb-1", text: undefined, options: undefined },
      ]);
    });

    it("should offer other cities for a city without a channel", async () => {
      await press(USER, cityCallback("uzhhorod"));
      expect(transport.lastText()).toBe(texts.cityUnavailableShort);
    });

    it("should alert when checking a subscription with no city chosen", async () => {
      await press(USER, CALLBACKS.checkSubscription);
      expect(transport.calls.at(-1)).toMatchObject({ text: texts.alerts.noCitySelected, options: { alert: true } });
    });
  });

  describe("cancel", () => {
    it("should say there is nothing to cancel when idle", async () => {
      await say(USER, "/cancel");
      expect(transport.lastText()).toBe(texts.nothingToCancel);
    });

    it("should end an ongoing flow", async () => {
      await say(USER, MENU_LABELS.chooseCity);
      later();
      await say(USER, "/cancel");

      expect(transport.lastText()).toBe(texts.cancelled);
      expect(await core.sessions.get(USER)).toEqual({ state: "idle", payload: {} });
    });
  });

  describe("failures", () => {
    it("should report a failed message handler", async () => {
      vi.spyOn(repository, "listAvailableCities").mockRejectedValueOnce(new Error("no such table: cities"));
      expect(await say(USER, MENU_LABELS.chooseCity)).toBe("failed");
    });

    it("should still answer the callback when its handler fails", async () => {
      vi.spyOn(repository, "findCityByCode").mockRejectedValueOnce(new Error("no such table: cities"));

      expect(await press(USER, cityCallback("kyiv"))).toBe("failed");
      expect(transport.callsOf("answerCallback")).toEqual([
        { method: "answerCallback", callbackId: "cb-1", text: undefined, options: undefined },
      ]);
    });
  });
});

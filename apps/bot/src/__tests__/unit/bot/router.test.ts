import { describe, it, expect } from "vitest";
import { callbackEvent, classifyMessage, type Sender } from "../../../bot/events.js";
import { CALLBACKS, cityCallback, parseCityCallback } from "../../../bot/keyboards.js";
import { resolveRoute, ROUTES } from "../../../bot/router.js";
import { MENU_LABELS } from "../../../bot/texts.js";
import { emptySession, type Session } from "../../../domain/session/index.js";

const from: Sender = { id: 7, username: null, firstName: null };
const idle = emptySession();
const awaitingCity: Session = { state: "awaiting_city", payload: {} };
const awaitingBody: Session = { state: "awaiting_broadcast_body", payload: {} };

const text = (value: string) => classifyMessage(7, from, { text: value });
const callback = (data: string) => callbackEvent(7, from, "cb", data, 1);

describe("resolveRoute", () => {
  describe("commands", () => {
    it("should map known commands", () => {
      expect(resolveRoute(text("/start"), idle)).toBe("start");
      expect(resolveRoute(text("/cancel"), awaitingCity)).toBe("cancel");
      expect(resolveRoute(text("/admin"), idle)).toBe("admin");
      expect(resolveRoute(text("/stats"), idle)).toBe("stats");
    });

    it("should send unknown commands to unknown_command", () => {
      expect(resolveRoute(text("/constructor"), idle)).toBe("unknown_command");
    });

    it("should win over an ongoing flow", () => {
      expect(resolveRoute(text("/help"), awaitingBody)).toBe("help");
    });
  });

  describe("menu buttons", () => {
    it("should map every label", () => {
      expect(resolveRoute(text(MENU_LABELS.chooseCity), awaitingCity)).toBe("menu_choose_city");
      expect(resolveRoute(text(MENU_LABELS.listApartment), idle)).toBe("menu_list_apartment");
      expect(resolveRoute(text(MENU_LABELS.subscribe), idle)).toBe("menu_subscribe");
      expect(resolveRoute(text(MENU_LABELS.checkSubscription), idle)).toBe("menu_check_subscription");
      expect(resolveRoute(text(MENU_LABELS.help), idle)).toBe("menu_help");
    });
  });

  describe("plain input", () => {
    it("should follow the session state", () => {
      expect(resolveRoute(text("Львів"), awaitingCity)).toBe("city_text");
      expect(resolveRoute(text("Новини тижня"), awaitingBody)).toBe("broadcast_body");
      expect(resolveRoute(text("привіт"), idle)).toBe("greeting");
    });

    it("should greet plain text typed in the admin menu", () => {
      const adminMenu: Session = { state: "admin_menu", payload: {} };
      expect(resolveRoute(text("Львів"), adminMenu)).toBe("greeting");
    });

    it("should take photos only as broadcast bodies", () => {
      const photo = classifyMessage(7, from, { photoFileId: "p" });
      expect(resolveRoute(photo, awaitingBody)).toBe("broadcast_body");
      expect(resolveRoute(photo, awaitingCity)).toBe("greeting");
    });
  });

  describe("callbacks", () => {
    it("should route city selections", () => {
      expect(resolveRoute(callback(cityCallback("lviv")), idle)).toBe("callback_city");
    });

    it("should route fixed payloads", () => {
      expect(resolveRoute(callback(CALLBACKS.checkSubscription), idle)).toBe("callback_check_subscription");
      expect(resolveRoute(callback(CALLBACKS.adminClearCache), idle)).toBe("callback_admin_clear_cache");
    });

    it("should route anything else to callback_unknown", () => {
      expect(resolveRoute(callback("city:"), idle)).toBe("callback_unknown");
      expect(resolveRoute(callback("toString"), idle)).toBe("callback_unknown");
    });
  });
});

describe("ROUTES", () => {
  it("should guard every admin route", () => {
    const guarded = Object.entries(ROUTES)
      .filter(([, definition]) => definition.adminOnly !== undefined)
      .map(([name]) => name)
      .sort();
    expect(guarded).toEqual([
      "admin",
      "broadcast_body",
      "callback_admin_broadcast",
      "callback_admin_clear_cache",
      "callback_admin_stats",
      "callback_admin_users",
      "stats",
    ]);
  });

  it("should never rate-limit callbacks", () => {
    const limited = Object.entries(ROUTES).filter(([name, d]) => name.startsWith("callback_") && d.rateLimited);
    expect(limited).toEqual([]);
  });
});

describe("parseCityCallback", () => {
  it("should extract the city code", () => {
    expect(parseCityCallback("city:kyiv")).toBe("kyiv");
    expect(parseCityCallback("kyiv")).toBeNull();
  });
});

import type { CityRecord } from "../repository/types.js";
import type { InlineButton, InlineKeyboard, ReplyKeyboard } from "../transport/types.js";
import { BUTTON_LABELS, MENU_LABELS, type Branding } from "./texts.js";

// =============================================================================
// Callback data
// =============================================================================

export const CALLBACKS = {
  checkSubscription: "check_subscription",
  backToMenu: "back_to_menu",
  adminStats: "admin_stats",
  adminBroadcast: "admin_broadcast",
  adminUsers: "admin_users",
  adminClearCache: "admin_clear_cache",
} as const;

export const CITY_CALLBACK_PREFIX = "city:";

export function cityCallback(code: string): string {
  return `${CITY_CALLBACK_PREFIX}${code}`;
}

/** City code from `city:<code>`, or null for any other payload */
export function parseCityCallback(data: string): string | null {
  if (!data.startsWith(CITY_CALLBACK_PREFIX)) return null;
  const code = data.slice(CITY_CALLBACK_PREFIX.length);
  return code === "" ? null : code;
}

// =============================================================================
// Keyboards
// =============================================================================

export function mainMenuKeyboard(): ReplyKeyboard {
  return {
    type: "reply",
    rows: [
      [MENU_LABELS.chooseCity],
      [MENU_LABELS.listApartment, MENU_LABELS.subscribe],
      [MENU_LABELS.checkSubscription, MENU_LABELS.help],
    ],
  };
}

/**
 * Two cities per row, then a way back.
 */
export function citiesKeyboard(cities: CityRecord[]): InlineKeyboard {
  const rows: InlineButton[][] = [];
  for (let i = 0; i < cities.length; i += 2) {
    rows.push(
      cities.slice(i, i + 2).map((city) => ({
        text: `🏙 ${city.nameUk}`,
        callbackData: cityCallback(city.code),
      }))
    );
  }
  rows.push([{ text: BUTTON_LABELS.backToMenu, callbackData: CALLBACKS.backToMenu }]);
  return { type: "inline", rows };
}

export function subscriptionKeyboard(brand: Branding): InlineKeyboard {
  return {
    type: "inline",
    rows: [
      [{ text: BUTTON_LABELS.subscribe, url: brand.mainChannelLink }],
      [{ text: BUTTON_LABELS.checkSubscription, callbackData: CALLBACKS.checkSubscription }],
      [{ text: BUTTON_LABELS.backToMenu, callbackData: CALLBACKS.backToMenu }],
    ],
  };
}

export function adminContactUrl(brand: Branding): string {
  return `https://t.me/${brand.adminContact.replace(/^@/, "")}`;
}

export function adminContactKeyboard(brand: Branding): InlineKeyboard {
  return {
    type: "inline",
    rows: [[{ text: BUTTON_LABELS.writeAdmin, url: adminContactUrl(brand) }]],
  };
}

export function mainChannelKeyboard(brand: Branding): InlineKeyboard {
  return {
    type: "inline",
    rows: [[{ text: BUTTON_LABELS.openMainChannel, url: brand.mainChannelLink }]],
  };
}

export function cityChannelKeyboard(brand: Branding, channelButton: string, channelUrl: string): InlineKeyboard {
  return {
    type: "inline",
    rows: [
      [{ text: channelButton, url: channelUrl }],
      [{ text: BUTTON_LABELS.chooseOtherCity, callbackData: CALLBACKS.backToMenu }],
      [{ text: BUTTON_LABELS.listApartment, url: adminContactUrl(brand) }],
    ],
  };
}

export function adminKeyboard(): InlineKeyboard {
  return {
    type: "inline",
    rows: [
      [
        { text: BUTTON_LABELS.adminStats, callbackData: CALLBACKS.adminStats },
        { text: BUTTON_LABELS.adminBroadcast, callbackData: CALLBACKS.adminBroadcast },
      ],
      [
        { text: BUTTON_LABELS.adminUsers, callbackData: CALLBACKS.adminUsers },
        { text: BUTTON_LABELS.adminClearCache, callbackData: CALLBACKS.adminClearCache },
      ],
    ],
  };
}

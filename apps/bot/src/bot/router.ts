import { isFlowState, type Session } from "../domain/session/index.js";
import type { BotEvent } from "./events.js";
import type { MenuButton } from "./texts.js";
import { CALLBACKS, parseCityCallback } from "./keyboards.js";

// =============================================================================
// Routing table
// =============================================================================

export type RouteName =
  | "start"
  | "help"
  | "cancel"
  | "admin"
  | "stats"
  | "unknown_command"
  | "menu_choose_city"
  | "menu_list_apartment"
  | "menu_subscribe"
  | "menu_check_subscription"
  | "menu_help"
  | "city_text"
  | "broadcast_body"
  | "greeting"
  | "callback_city"
  | "callback_check_subscription"
  | "callback_back_to_menu"
  | "callback_admin_stats"
  | "callback_admin_broadcast"
  | "callback_admin_users"
  | "callback_admin_clear_cache"
  | "callback_unknown";

/**
 * How a non-admin is turned away from an admin-only route:
 * - reject: "command not recognised" for commands, a "no access" alert for callbacks
 * - ignore: no reply at all
 */
export type AdminGuard = "reject" | "ignore";

export interface RouteDefinition {
  /** Messages from any sender pass the rate limiter first; callbacks never do */
  rateLimited: boolean;
  /** Clears any ongoing flow before the handler runs */
  interrupts: boolean;
  adminOnly?: AdminGuard;
}

export const ROUTES: Record<RouteName, RouteDefinition> = {
  start: { rateLimited: true, interrupts: true },
  help: { rateLimited: true, interrupts: true },
  // cancel clears the session itself so it can tell whether a flow was active
  cancel: { rateLimited: false, interrupts: false },
  admin: { rateLimited: false, interrupts: true, adminOnly: "reject" },
  stats: { rateLimited: false, interrupts: true, adminOnly: "reject" },
  unknown_command: { rateLimited: false, interrupts: true },

  menu_choose_city: { rateLimited: true, interrupts: true },
  menu_list_apartment: { rateLimited: true, interrupts: true },
  menu_subscribe: { rateLimited: true, interrupts: true },
  menu_check_subscription: { rateLimited: true, interrupts: true },
  menu_help: { rateLimited: true, interrupts: true },

  city_text: { rateLimited: true, interrupts: false },
  broadcast_body: { rateLimited: false, interrupts: false, adminOnly: "ignore" },
  greeting: { rateLimited: true, interrupts: false },

  callback_city: { rateLimited: false, interrupts: false },
  callback_check_subscription: { rateLimited: false, interrupts: false },
  callback_back_to_menu: { rateLimited: false, interrupts: false },
  callback_admin_stats: { rateLimited: false, interrupts: false, adminOnly: "reject" },
  callback_admin_broadcast: { rateLimited: false, interrupts: false, adminOnly: "reject" },
  callback_admin_users: { rateLimited: false, interrupts: false, adminOnly: "reject" },
  callback_admin_clear_cache: { rateLimited: false, interrupts: false, adminOnly: "reject" },
  callback_unknown: { rateLimited: false, interrupts: false },
};

const COMMAND_ROUTES = new Map<string, RouteName>([
  ["start", "start"],
  ["help", "help"],
  ["cancel", "cancel"],
  ["admin", "admin"],
  ["stats", "stats"],
]);

const MENU_ROUTES = {
  chooseCity: "menu_choose_city",
  listApartment: "menu_list_apartment",
  subscribe: "menu_subscribe",
  checkSubscription: "menu_check_subscription",
  help: "menu_help",
} as const satisfies Record<MenuButton, RouteName>;

const CALLBACK_ROUTES = new Map<string, RouteName>([
  [CALLBACKS.checkSubscription, "callback_check_subscription"],
  [CALLBACKS.backToMenu, "callback_back_to_menu"],
  [CALLBACKS.adminStats, "callback_admin_stats"],
  [CALLBACKS.adminBroadcast, "callback_admin_broadcast"],
  [CALLBACKS.adminUsers, "callback_admin_users"],
  [CALLBACKS.adminClearCache, "callback_admin_clear_cache"],
]);

/**
 * Pick the route for an event given the sender's current session.
 *
 * Commands and menu buttons win over any flow; plain input goes to the
 * flow the session is in.
 */
export function resolveRoute(event: BotEvent, session: Session): RouteName {
  switch (event.kind) {
    case "command":
      return COMMAND_ROUTES.get(event.command) ?? "unknown_command";

    case "menu":
      return MENU_ROUTES[event.button];

    case "callback":
      if (parseCityCallback(event.data) !== null) return "callback_city";
      return CALLBACK_ROUTES.get(event.data) ?? "callback_unknown";

    case "text": {
      const { state } = session;
      if (!isFlowState(state)) return "greeting";
      return state === "awaiting_city" ? "city_text" : "broadcast_body";
    }

    case "photo":
    case "other":
      if (session.state === "awaiting_broadcast_body") return "broadcast_body";
      return "greeting";
  }
}

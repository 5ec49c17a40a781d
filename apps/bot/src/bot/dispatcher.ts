import { logFailure, log, withTraceAsync } from "../logger.js";
import { botUpdatesTotal } from "../metrics.js";
import type { Repository } from "../repository/types.js";
import type { RateLimiter } from "../services/rate-limiter.js";
import type { SessionStore } from "../services/session-store.js";
import { answerQuietly } from "../transport/safe-edit.js";
import type { Transport } from "../transport/types.js";
import type { BotEvent } from "./events.js";
import type { BotHandlers } from "./handlers.js";
import { resolveRoute, ROUTES, type RouteName } from "./router.js";
import type { Texts } from "./texts.js";

export interface DispatcherDependencies {
  handlers: BotHandlers;
  repository: Repository;
  transport: Transport;
  limiter: RateLimiter;
  sessions: SessionStore;
  texts: Texts;
  /** 0 means no admin is configured */
  adminId: number;
}

export type DispatchOutcome = "handled" | "denied" | "rate_limited" | "failed";

/**
 * Single entry point for inbound events.
 *
 * Order: route → admin guard → rate limit → interrupt → user upsert → handler.
 * A denied or dropped event changes nothing.
 */
export class Dispatcher {
  constructor(private readonly deps: DispatcherDependencies) {}

  isAdmin(userId: number): boolean {
    return this.deps.adminId !== 0 && userId === this.deps.adminId;
  }

  async dispatch(event: BotEvent): Promise<DispatchOutcome> {
    return withTraceAsync(async () => {
      let route: RouteName | undefined;
      try {
        const session = await this.deps.sessions.get(event.from.id);
        route = resolveRoute(event, session);
        const definition = ROUTES[route];
        const admin = this.isAdmin(event.from.id);

        if (definition.adminOnly && !admin) {
          await this.deny(event, definition.adminOnly);
          log.dispatch.info({ route, userId: event.from.id }, "admin route denied");
          return "denied";
        }

        if (definition.rateLimited && event.kind !== "callback") {
          if (!(await this.deps.limiter.admit(event.from.id))) {
            return "rate_limited";
          }
        }

        if (definition.interrupts) {
          await this.deps.sessions.clear(event.from.id);
        }

        await this.touchUser(event);
        botUpdatesTotal.inc({ route });

        const current = definition.interrupts ? await this.deps.sessions.get(event.from.id) : session;
        await this.deps.handlers.handle(route, event, current);
        log.dispatch.debug({ route, userId: event.from.id }, "handled");
        return "handled";
      } catch (error) {
        logFailure("dispatch", "handler failed", error, { route, userId: event.from.id, kind: event.kind });
        if (event.kind === "callback") {
          await answerQuietly(this.deps.transport, event.callbackId);
        }
        return "failed";
      }
    });
  }

  private async deny(event: BotEvent, guard: "reject" | "ignore"): Promise<void> {
    if (guard === "ignore") return;

    if (event.kind === "callback") {
      await answerQuietly(this.deps.transport, event.callbackId, this.deps.texts.alerts.noAccess, true);
      return;
    }
    await this.deps.transport.sendText(event.chatId, this.deps.texts.unknownCommand);
  }

  /** Upsert on every contact; a failure here does not stop the reply */
  private async touchUser(event: BotEvent): Promise<void> {
    const utmSource =
      event.kind === "command" && event.command === "start" && event.args !== "" ? event.args : undefined;
    try {
      await this.deps.repository.saveUser({
        tgId: event.from.id,
        username: event.from.username,
        firstName: event.from.firstName,
        utmSource,
      });
    } catch (error) {
      logFailure("db", "user upsert failed", error, { userId: event.from.id });
    }
  }
}

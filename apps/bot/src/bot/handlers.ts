import { parseBroadcastContent, type BroadcastDraftInput } from "../domain/broadcast/index.js";
import { isEmptySession, type Session } from "../domain/session/index.js";
import type { TimeProvider } from "../domain/utils/index.js";
import { log } from "../logger.js";
import type { Repository } from "../repository/types.js";
import type { BroadcastRunner } from "../services/broadcast-runner.js";
import { hasChannel, type CityResolver } from "../services/city-resolver.js";
import type { RateLimiter } from "../services/rate-limiter.js";
import type { ReplyCooldown } from "../services/reply-cooldown.js";
import type { SessionStore } from "../services/session-store.js";
import { membershipCheck, type SubscriptionCache } from "../services/subscription-cache.js";
import { answerQuietly, safeEdit } from "../transport/safe-edit.js";
import type { InlineKeyboard, Keyboard, Transport } from "../transport/types.js";
import type { BotEvent, CallbackEvent, MessageEvent } from "./events.js";
import {
  adminContactKeyboard,
  adminKeyboard,
  citiesKeyboard,
  cityChannelKeyboard,
  mainChannelKeyboard,
  mainMenuKeyboard,
  parseCityCallback,
  subscriptionKeyboard,
} from "./keyboards.js";
import type { RouteName } from "./router.js";
import type { Branding, Texts } from "./texts.js";

export interface BotDependencies {
  repository: Repository;
  transport: Transport;
  limiter: RateLimiter;
  subscriptions: SubscriptionCache;
  replies: ReplyCooldown;
  sessions: SessionStore;
  cities: CityResolver;
  runner: BroadcastRunner;
  texts: Texts;
  brand: Branding;
  time: TimeProvider;
}

/**
 * One method per route. The dispatcher has already applied the admin guard,
 * the rate limit and flow interruption by the time these run.
 */
export class BotHandlers {
  constructor(private readonly deps: BotDependencies) {}

  async handle(route: RouteName, event: BotEvent, session: Session): Promise<void> {
    if (event.kind === "callback") {
      return this.handleCallback(route, event, session);
    }

    switch (route) {
      case "start":
        return this.reply(event, this.deps.texts.welcome(event.from.firstName), mainMenuKeyboard());
      case "help":
      case "menu_help":
        return this.help(event);
      case "cancel":
        return this.cancel(event, session);
      case "admin":
        return this.adminPanel(event);
      case "stats":
        return this.runtimeStats(event);
      case "unknown_command":
        return this.reply(event, this.deps.texts.unknownCommand);
      case "menu_choose_city":
        return this.chooseCity(event);
      case "menu_list_apartment":
        return this.reply(event, this.deps.texts.listApartment, adminContactKeyboard(this.deps.brand));
      case "menu_subscribe":
        return this.reply(event, this.deps.texts.subscribe, mainChannelKeyboard(this.deps.brand));
      case "menu_check_subscription":
        return this.subscriptionStatus(event);
      case "city_text":
        return event.kind === "text" ? this.cityText(event, event.text) : undefined;
      case "broadcast_body":
        return this.broadcastBody(event);
      case "greeting":
        return this.reply(event, this.deps.texts.greeting(event.from.firstName), mainMenuKeyboard());
      default:
        log.dispatch.debug({ route, kind: event.kind }, "route does not take messages");
    }
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  private async cancel(event: MessageEvent, session: Session): Promise<void> {
    await this.deps.sessions.clear(event.from.id);
    if (isEmptySession(session)) {
      await this.reply(event, this.deps.texts.nothingToCancel);
      return;
    }
    await this.reply(event, this.deps.texts.cancelled, mainMenuKeyboard());
  }

  private async chooseCity(event: MessageEvent): Promise<void> {
    const cities = await this.deps.cities.listAvailable();
    await this.deps.sessions.enter(event.from.id, "awaiting_city");
    await this.reply(event, this.deps.texts.chooseCity, citiesKeyboard(cities));
  }

  private async subscriptionStatus(event: MessageEvent): Promise<void> {
    const subscribed = await this.isSubscribed(event.from.id);
    await this.reply(
      event,
      this.deps.texts.subscriptionStatus(subscribed),
      subscribed ? undefined : mainChannelKeyboard(this.deps.brand)
    );
  }

  private async cityText(event: MessageEvent, input: string): Promise<void> {
    const { texts, cities, sessions } = this.deps;
    const query = input.trim();
    const city = await cities.resolve(query);

    if (!city) {
      await this.reply(event, texts.cityNotFound(query), citiesKeyboard(await cities.listAvailable()));
      return;
    }
    if (!hasChannel(city)) {
      await this.reply(event, texts.cityUnavailable(city.nameUk), citiesKeyboard(await cities.listAvailable()));
      return;
    }

    if (await this.isSubscribed(event.from.id)) {
      await this.deps.repository.updateUserCity(event.from.id, city.code, city.nameUk);
      await sessions.clear(event.from.id);
      await this.reply(event, texts.channelDelivered(city.nameUk), this.channelKeyboard(city.nameUk, city.channelUrl));
      return;
    }

    await sessions.merge(event.from.id, { selectedCityCode: city.code, selectedCityName: city.nameUk });
    await this.reply(event, texts.subscriptionPrompt(city.nameUk), subscriptionKeyboard(this.deps.brand));
  }

  private async broadcastBody(event: MessageEvent): Promise<void> {
    const { texts, sessions, runner, repository } = this.deps;

    const parsed = parseBroadcastContent(draftFrom(event));
    if (!parsed.ok) {
      await this.reply(event, texts.broadcastEmpty);
      return;
    }

    const result = await runner.start({
      adminTgId: event.from.id,
      chatId: event.chatId,
      content: parsed.content,
    });
    await sessions.clear(event.from.id);

    switch (result.status) {
      case "busy":
        await this.reply(event, texts.broadcastBusy);
        return;
      case "no_recipients":
        await this.reply(event, texts.broadcastNoUsers);
        return;
      case "started":
        await repository.logAdminAction(event.from.id, "broadcast", {
          broadcastId: result.broadcastId,
          recipients: result.recipients,
          kind: parsed.content.kind,
        });
    }
  }

  private async adminPanel(event: MessageEvent): Promise<void> {
    const users = await this.deps.repository.countUsers(true);
    const available = await this.deps.cities.listAvailable();
    await this.deps.sessions.enter(event.from.id, "admin_menu");
    await this.reply(
      event,
      this.deps.texts.adminPanel(users, available.length, new Date(this.deps.time.now())),
      adminKeyboard()
    );
  }

  private async help(event: MessageEvent): Promise<void> {
    const { replies, texts, time } = this.deps;
    if (!(await replies.tryAcquire(`help:${event.from.id}`, time.now()))) {
      log.dispatch.debug({ userId: event.from.id }, "repeated help skipped");
      return;
    }
    await this.reply(event, texts.help, mainMenuKeyboard());
  }

  private async runtimeStats(event: MessageEvent): Promise<void> {
    const { repository, cities, limiter, subscriptions, replies, sessions } = this.deps;
    const [users, available, limits, cacheSize, replyCacheSize, sessionCount] = await Promise.all([
      repository.countUsers(false),
      cities.listAvailable(),
      limiter.stats(),
      subscriptions.size(),
      replies.size(),
      sessions.size(),
    ]);
    await this.reply(
      event,
      this.deps.texts.runtimeStats({
        users,
        availableCities: available.length,
        spamBlocked: limits.blockedUsers,
        subscriptionCache: cacheSize,
        replyCache: replyCacheSize,
        sessions: sessionCount,
      })
    );
  }

  // ===========================================================================
  // Callbacks
  // ===========================================================================

  private async handleCallback(route: RouteName, event: CallbackEvent, session: Session): Promise<void> {
    switch (route) {
      case "callback_city":
        return this.selectCity(event);
      case "callback_check_subscription":
        return this.confirmSubscription(event, session);
      case "callback_back_to_menu":
        await this.deps.sessions.clear(event.from.id);
        await this.edit(event, this.deps.texts.mainMenu);
        return;
      case "callback_admin_stats":
        return this.extendedStats(event);
      case "callback_admin_broadcast":
        return this.broadcastPrompt(event);
      case "callback_admin_users":
        return this.usersInfo(event);
      case "callback_admin_clear_cache":
        return this.clearCaches(event);
      default:
        await answerQuietly(this.deps.transport, event.callbackId);
    }
  }

  private async selectCity(event: CallbackEvent): Promise<void> {
    const { cities, sessions, texts } = this.deps;
    const code = parseCityCallback(event.data);
    const city = code === null ? null : await cities.findByCode(code);

    if (!city || !hasChannel(city)) {
      await this.edit(event, texts.cityUnavailableShort, citiesKeyboard(await cities.listAvailable()));
      return;
    }

    await sessions.merge(event.from.id, { selectedCityCode: city.code, selectedCityName: city.nameUk });

    if (await this.isSubscribed(event.from.id)) {
      await this.deliverChannel(event, city.code, city.nameUk, city.channelUrl);
      await answerQuietly(this.deps.transport, event.callbackId);
      return;
    }
    await this.edit(event, texts.subscriptionPrompt(city.nameUk), subscriptionKeyboard(this.deps.brand));
  }

  private async confirmSubscription(event: CallbackEvent, session: Session): Promise<void> {
    const { alerts } = this.deps.texts;
    const code = session.payload.selectedCityCode;
    if (code === undefined) {
      await this.alert(event, alerts.noCitySelected);
      return;
    }

    if (!(await this.isSubscribed(event.from.id))) {
      await this.alert(event, alerts.subscriptionMissing);
      return;
    }

    const city = await this.deps.cities.findByCode(code);
    if (!city || !hasChannel(city)) {
      await this.alert(event, alerts.cityNotFound);
      return;
    }

    await this.deliverChannel(event, city.code, city.nameUk, city.channelUrl);
    await answerQuietly(this.deps.transport, event.callbackId, alerts.subscriptionConfirmed);
  }

  /** Record the choice, end the flow, show the channel link */
  private async deliverChannel(
    event: CallbackEvent,
    code: string,
    nameUk: string,
    channelUrl: string
  ): Promise<void> {
    await this.deps.repository.updateUserCity(event.from.id, code, nameUk);
    await this.deps.sessions.clear(event.from.id);
    await safeEdit(
      this.deps.transport,
      { chatId: event.chatId, messageId: event.messageId },
      this.deps.texts.channelDelivered(nameUk),
      this.channelKeyboard(nameUk, channelUrl)
    );
  }

  private async extendedStats(event: CallbackEvent): Promise<void> {
    const { repository, cities, subscriptions, texts, time } = this.deps;
    await repository.logAdminAction(event.from.id, "view_stats");

    const now = new Date(time.now());
    const [stats, available, cacheSize] = await Promise.all([
      repository.getAdminStats(now),
      cities.listAvailable(),
      subscriptions.size(),
    ]);
    await this.edit(event, texts.extendedStats(stats, available.length, cacheSize, now), adminKeyboard());
  }

  private async broadcastPrompt(event: CallbackEvent): Promise<void> {
    const activeUsers = await this.deps.repository.countUsers(true);
    await this.deps.sessions.enter(event.from.id, "awaiting_broadcast_body");
    await this.edit(event, this.deps.texts.broadcastPrompt(activeUsers));
  }

  private async usersInfo(event: CallbackEvent): Promise<void> {
    const stats = await this.deps.repository.getAdminStats(new Date(this.deps.time.now()));
    await this.edit(event, this.deps.texts.usersInfo(stats), adminKeyboard());
  }

  private async clearCaches(event: CallbackEvent): Promise<void> {
    const { limiter, subscriptions, replies, repository, texts } = this.deps;
    await limiter.reset();
    await subscriptions.clear();
    await replies.clear();
    await repository.logAdminAction(event.from.id, "clear_cache");
    log.dispatch.info({ adminId: event.from.id }, "caches cleared");
    await this.alert(event, texts.alerts.cacheCleared);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async isSubscribed(userId: number): Promise<boolean> {
    const { subscriptions, transport, brand, time } = this.deps;
    return subscriptions.isSubscribed(userId, time.now(), membershipCheck(transport, brand.mainChannel, userId));
  }

  private channelKeyboard(nameUk: string, channelUrl: string): InlineKeyboard {
    return cityChannelKeyboard(this.deps.brand, this.deps.texts.channelButton(nameUk), channelUrl);
  }

  private async reply(event: MessageEvent, text: string, keyboard?: Keyboard): Promise<void> {
    await this.deps.transport.sendText(event.chatId, text, keyboard ? { keyboard } : undefined);
  }

  /** Edit the callback's message and answer the callback */
  private async edit(event: CallbackEvent, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await safeEdit(
      this.deps.transport,
      { chatId: event.chatId, messageId: event.messageId, callbackId: event.callbackId },
      text,
      keyboard
    );
  }

  private async alert(event: CallbackEvent, text: string): Promise<void> {
    await answerQuietly(this.deps.transport, event.callbackId, text, true);
  }
}

function draftFrom(event: MessageEvent): BroadcastDraftInput {
  switch (event.kind) {
    case "photo":
      return { photoFileId: event.fileId, caption: event.caption };
    case "text":
      return { text: event.text };
    default:
      return {};
  }
}

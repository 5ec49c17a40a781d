import { SystemTimeProvider, type Sleep, type TimeProvider } from "../domain/utils/index.js";
import type { Repository } from "../repository/types.js";
import { BroadcastEngine } from "../services/broadcast-engine.js";
import { BroadcastRunner } from "../services/broadcast-runner.js";
import { CityResolver } from "../services/city-resolver.js";
import { RateLimiter } from "../services/rate-limiter.js";
import { ReplyCooldown } from "../services/reply-cooldown.js";
import { SessionStore } from "../services/session-store.js";
import { SubscriptionCache } from "../services/subscription-cache.js";
import type { Transport } from "../transport/types.js";
import { Dispatcher } from "./dispatcher.js";
import { BotHandlers } from "./handlers.js";
import { broadcastStatusView, createTexts, type Branding } from "./texts.js";

export * from "./events.js";
export * from "./keyboards.js";
export * from "./router.js";
export { Dispatcher, type DispatchOutcome } from "./dispatcher.js";
export { BotHandlers, type BotDependencies } from "./handlers.js";
export { BOT_COMMANDS, broadcastStatusView, createTexts, type Branding, type Texts } from "./texts.js";

export interface BotCoreSettings {
  adminId: number;
  brand: Branding;
  rateLimit: { threshold: number; windowMs: number; cooldownMs: number };
  subscriptionTtlMs: number;
  /** Repeated help requests inside this window get no reply */
  helpCooldownMs?: number;
  broadcast: { delayMs: number; progressEvery: number; sleep?: Sleep };
}

export interface BotCore {
  dispatcher: Dispatcher;
  limiter: RateLimiter;
  subscriptions: SubscriptionCache;
  replies: ReplyCooldown;
  sessions: SessionStore;
  cities: CityResolver;
  runner: BroadcastRunner;
}

/**
 * Wire the in-memory services, the broadcast runner and the dispatcher
 * around a repository and a transport.
 */
export function createBotCore(
  repository: Repository,
  transport: Transport,
  settings: BotCoreSettings,
  time: TimeProvider = new SystemTimeProvider()
): BotCore {
  const texts = createTexts(settings.brand);
  const limiter = new RateLimiter(settings.rateLimit, time);
  const subscriptions = new SubscriptionCache(settings.subscriptionTtlMs);
  const replies = new ReplyCooldown(settings.helpCooldownMs);
  const sessions = new SessionStore();
  const cities = new CityResolver(repository);
  const engine = new BroadcastEngine(transport, repository, settings.broadcast);
  const runner = new BroadcastRunner(repository, transport, engine, broadcastStatusView, time);

  const handlers = new BotHandlers({
    repository,
    transport,
    limiter,
    subscriptions,
    replies,
    sessions,
    cities,
    runner,
    texts,
    brand: settings.brand,
    time,
  });

  const dispatcher = new Dispatcher({
    handlers,
    repository,
    transport,
    limiter,
    sessions,
    texts,
    adminId: settings.adminId,
  });

  return { dispatcher, limiter, subscriptions, replies, sessions, cities, runner };
}

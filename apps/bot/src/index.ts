import { Bot } from "grammy";
import { loadSeedCities } from "@nestfinder/db";
import {
  attachDispatcher,
  createWebhookHandler,
  registerWebhook,
  startPolling,
  type Intake,
} from "./bot/grammy.js";
import { BOT_COMMANDS, createBotCore, createTexts, type Branding } from "./bot/index.js";
import { config } from "./config.js";
import { SystemTimeProvider } from "./domain/index.js";
import { buildServer, type WebhookRoute } from "./http/server.js";
import { createTimer, log, logFailure, logWarning } from "./logger.js";
import { runPreflightChecks } from "./preflight.js";
import { createRepository } from "./repository/index.js";
import { reconcileInterruptedBroadcasts } from "./services/index.js";
import { TelegramTransport } from "./transport/index.js";

const SHUTDOWN_TIMEOUT_MS = config.SHUTDOWN_TIMEOUT_MS;

const brand: Branding = {
  mainChannel: config.MAIN_CHANNEL,
  mainChannelLink: config.MAIN_CHANNEL_LINK,
  adminContact: config.ADMIN_CONTACT.replace(/^@/, ""),
};

const time = new SystemTimeProvider();
const repository = createRepository(config);
const bot = new Bot(config.BOT_TOKEN);
const transport = new TelegramTransport(bot.api);

const core = createBotCore(
  repository,
  transport,
  {
    adminId: config.ADMIN_ID,
    brand,
    rateLimit: {
      threshold: config.RATE_LIMIT_THRESHOLD,
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      cooldownMs: config.MESSAGE_COOLDOWN_MS,
    },
    subscriptionTtlMs: config.SUBSCRIPTION_CACHE_TTL_MS,
    helpCooldownMs: config.HELP_COOLDOWN_MS,
    broadcast: {
      delayMs: config.BROADCAST_DELAY_MS,
      progressEvery: config.BROADCAST_PROGRESS_EVERY,
    },
  },
  time
);
attachDispatcher(bot, core.dispatcher);

const webhook: WebhookRoute | undefined =
  config.TRANSPORT_MODE === "webhook"
    ? { path: config.WEBHOOK_PATH, handler: createWebhookHandler(bot, config.WEBHOOK_SECRET) }
    : undefined;

const app = buildServer({ repository, metricsEnabled: config.METRICS_ENABLED, webhook });

let intake: Intake | null = null;

async function prepareDatabase(): Promise<void> {
  await repository.bootstrap();
  if (config.SEED_CITIES) {
    const inserted = await repository.seedCities(loadSeedCities());
    log.db.info({ inserted }, "cities seeded");
  }
}

async function notifyAdmin(username: string): Promise<void> {
  if (config.ADMIN_ID === 0) return;
  try {
    await transport.sendText(config.ADMIN_ID, createTexts(brand).botStarted(username, new Date(time.now())));
  } catch (error) {
    logWarning("bot", "admin start notice failed", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

async function main(): Promise<void> {
  const elapsed = createTimer();
  log.system.info({ mode: config.TRANSPORT_MODE, dialect: repository.dialect }, "starting");

  try {
    await prepareDatabase();
  } catch (error) {
    logFailure("db", "database bootstrap failed", error, { dialect: repository.dialect });
    process.exit(1);
  }

  const preflight = await runPreflightChecks(repository, transport, config.MAIN_CHANNEL);
  if (!preflight.ready || !preflight.identity) {
    process.exit(1);
  }
  await bot.init();

  await reconcileInterruptedBroadcasts(repository, time);

  try {
    await transport.setCommands(BOT_COMMANDS);
  } catch (error) {
    logWarning("bot", "setting commands failed", {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  await notifyAdmin(preflight.identity.username);

  await app.listen({ port: config.PORT, host: "0.0.0.0" });
  log.api.info({ port: config.PORT }, "http server listening");

  if (config.TRANSPORT_MODE === "webhook" && config.PUBLIC_URL) {
    const url = new URL(config.WEBHOOK_PATH, config.PUBLIC_URL).toString();
    intake = await registerWebhook(bot, { url, secretToken: config.WEBHOOK_SECRET });
  } else {
    intake = await startPolling(bot);
  }

  log.system.info(
    { username: preflight.identity.username, adminConfigured: config.ADMIN_ID !== 0, duration: elapsed() },
    "bot ready"
  );
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, name: string): Promise<T | void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn(
      { error: error instanceof Error ? error.message : String(error), component: name },
      "shutdown step failed"
    );
  } finally {
    clearTimeout(timer);
  }
}

async function shutdown(): Promise<void> {
  log.system.info({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, "shutting down");
  const shutdownStart = Date.now();

  // Phase 1: Stop accepting updates
  log.system.debug({}, "Phase 1: Stop intake");
  if (intake) {
    await withTimeout(intake.stop(), 5000, "Intake");
  }
  await withTimeout(app.close(), 2000, "Fastify");

  // Phase 2: Let the active broadcast finish
  log.system.debug({}, "Phase 2: Drain broadcast");
  const drainBudget = Math.max(SHUTDOWN_TIMEOUT_MS - (Date.now() - shutdownStart) - 3000, 0);
  const drained = await core.runner.drain(drainBudget);
  if (!drained) {
    log.system.warn(
      { broadcastId: core.runner.activeBroadcastId },
      "broadcast still running, it will be marked interrupted on next start"
    );
  }

  // Phase 3: Close connections
  log.system.debug({}, "Phase 3: Close connections");
  await withTimeout(repository.close(), 2000, "Database");

  log.system.info({ durationMs: Date.now() - shutdownStart }, "shutdown complete");
  process.exit(0);
}

// Force exit if graceful shutdown takes too long
let shutdownInProgress = false;
async function initiateShutdown(): Promise<void> {
  if (shutdownInProgress) {
    log.system.warn({}, "shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shutdownInProgress = true;

  const forceExitTimer = setTimeout(() => {
    log.system.error({}, "shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref();

  await shutdown();
}

process.on("SIGTERM", () => {
  void initiateShutdown();
});
process.on("SIGINT", () => {
  void initiateShutdown();
});

main().catch((error: unknown) => {
  logFailure("system", "fatal startup error", error, {});
  process.exit(1);
});

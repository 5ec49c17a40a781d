import { run, type RunnerHandle } from "@grammyjs/runner";
import { Bot, webhookCallback, type Context } from "grammy";
import type { User } from "grammy/types";
import { log, logFailure } from "../logger.js";
import type { Dispatcher } from "./dispatcher.js";
import { callbackEvent, classifyMessage, type Sender } from "./events.js";

function toSender(user: User): Sender {
  return {
    id: user.id,
    username: user.username ?? null,
    firstName: user.first_name ?? null,
  };
}

/**
 * Feed grammY updates into the dispatcher. Only private-chat messages and
 * inline button presses are handled.
 */
export function attachDispatcher(bot: Bot, dispatcher: Dispatcher): void {
  bot.chatType("private").on("message", async (ctx) => {
    const message = ctx.message;
    const from = message.from;
    if (!from) return;
    const photo = message.photo?.[message.photo.length - 1];

    const event = classifyMessage(ctx.chat.id, toSender(from), {
      text: message.text,
      photoFileId: photo?.file_id,
      caption: message.caption,
    });
    await dispatcher.dispatch(event);
  });

  bot.on("callback_query:data", async (ctx) => {
    const query = ctx.callbackQuery;
    if (!query.message) {
      await answerStale(ctx);
      return;
    }

    await dispatcher.dispatch(
      callbackEvent(query.message.chat.id, toSender(query.from), query.id, query.data, query.message.message_id)
    );
  });

  bot.catch((err) => {
    logFailure("bot", "update failed", err.error, { updateId: err.ctx.update.update_id });
  });
}

// Inline keyboards on messages older than 48h arrive without the message
async function answerStale(ctx: Context): Promise<void> {
  try {
    await ctx.answerCallbackQuery();
  } catch (error) {
    log.bot.debug({ error: error instanceof Error ? error.message : String(error) }, "stale callback answer failed");
  }
}

// =============================================================================
// Intake
// =============================================================================

export interface Intake {
  mode: "polling" | "webhook";
  stop(): Promise<void>;
}

/**
 * Long polling through @grammyjs/runner: updates from different chats are
 * processed concurrently.
 */
export async function startPolling(bot: Bot): Promise<Intake> {
  await bot.api.deleteWebhook({ drop_pending_updates: true });
  const handle: RunnerHandle = run(bot);
  log.bot.info({ username: bot.botInfo.username }, "polling started");

  return {
    mode: "polling",
    async stop() {
      if (handle.isRunning()) {
        await handle.stop();
      }
    },
  };
}

export interface WebhookRegistration {
  url: string;
  secretToken?: string;
}

/** Point Telegram at our HTTP endpoint. Updates are served by the fastify route */
export async function registerWebhook(bot: Bot, registration: WebhookRegistration): Promise<Intake> {
  await bot.api.setWebhook(registration.url, {
    secret_token: registration.secretToken,
    drop_pending_updates: true,
  });
  log.bot.info({ url: registration.url }, "webhook registered");

  return {
    mode: "webhook",
    // Intake stops with the HTTP server; the webhook stays registered for the next start
    async stop() {},
  };
}

export function createWebhookHandler(bot: Bot, secretToken?: string) {
  return webhookCallback(bot, "fastify", { secretToken });
}

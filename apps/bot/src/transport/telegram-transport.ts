import {
  GrammyError,
  HttpError,
  InlineKeyboard as InlineKeyboardBuilder,
  Keyboard as ReplyKeyboardBuilder,
  type Api,
} from "grammy";
import type { MembershipStatus } from "../domain/subscription/types.js";
import { log } from "../logger.js";
import { TransportError } from "./errors.js";
import type {
  AnswerCallbackOptions,
  BotCommand,
  BotIdentity,
  EditOptions,
  InlineKeyboard,
  Keyboard,
  SendOptions,
  SentMessage,
  Transport,
} from "./types.js";

const NOT_MODIFIED = "message is not modified";

/**
 * Map grammY failures onto the transport error taxonomy.
 */
export function classifyTelegramError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;

  if (error instanceof GrammyError) {
    const code = String(error.error_code);
    if (error.error_code === 403) {
      return new TransportError("forbidden", code, error.description, { cause: error });
    }
    if (error.error_code === 400 && error.description.toLowerCase().includes(NOT_MODIFIED)) {
      return new TransportError("not_modified", code, error.description, { cause: error });
    }
    return new TransportError("transient", code, error.description, { cause: error });
  }

  if (error instanceof HttpError) {
    return new TransportError("transient", "network", error.message, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError("transient", "unknown", message, { cause: error });
}

function renderInline(keyboard: InlineKeyboard): InlineKeyboardBuilder {
  const builder = new InlineKeyboardBuilder();
  keyboard.rows.forEach((row, index) => {
    if (index > 0) builder.row();
    for (const button of row) {
      if ("url" in button) {
        builder.url(button.text, button.url);
      } else {
        builder.text(button.text, button.callbackData);
      }
    }
  });
  return builder;
}

function renderKeyboard(keyboard: Keyboard) {
  switch (keyboard.type) {
    case "inline":
      return renderInline(keyboard);
    case "reply": {
      const builder = new ReplyKeyboardBuilder();
      keyboard.rows.forEach((row, index) => {
        if (index > 0) builder.row();
        for (const label of row) builder.text(label);
      });
      return builder.resized().persistent();
    }
    case "remove":
      return { remove_keyboard: true as const };
  }
}

/**
 * Transport backed by the Telegram Bot API through grammY.
 * Messages are sent with HTML parse mode.
 */
export class TelegramTransport implements Transport {
  name = "telegram";

  constructor(private readonly api: Api) {}

  async sendText(chatId: number, text: string, options: SendOptions = {}): Promise<SentMessage> {
    try {
      const message = await this.api.sendMessage(chatId, text, {
        parse_mode: "HTML",
        reply_markup: options.keyboard ? renderKeyboard(options.keyboard) : undefined,
      });
      return { messageId: message.message_id };
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  async sendPhoto(
    chatId: number,
    fileId: string,
    caption?: string,
    options: SendOptions = {}
  ): Promise<SentMessage> {
    try {
      const message = await this.api.sendPhoto(chatId, fileId, {
        caption,
        parse_mode: "HTML",
        reply_markup: options.keyboard ? renderKeyboard(options.keyboard) : undefined,
      });
      return { messageId: message.message_id };
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  async editText(chatId: number, messageId: number, text: string, options: EditOptions = {}): Promise<void> {
    try {
      await this.api.editMessageText(chatId, messageId, text, {
        parse_mode: "HTML",
        reply_markup: options.keyboard ? renderInline(options.keyboard) : undefined,
      });
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  async answerCallback(callbackId: string, text?: string, options: AnswerCallbackOptions = {}): Promise<void> {
    try {
      await this.api.answerCallbackQuery(callbackId, { text, show_alert: options.alert });
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  async getMembershipStatus(channel: string, userId: number): Promise<MembershipStatus> {
    try {
      const member = await this.api.getChatMember(channel, userId);
      return member.status;
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  async getMe(): Promise<BotIdentity> {
    try {
      const me = await this.api.getMe();
      return { id: me.id, username: me.username };
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }

  async setCommands(commands: BotCommand[]): Promise<void> {
    try {
      await this.api.setMyCommands(commands);
      log.transport.debug({ count: commands.length }, "commands registered");
    } catch (error) {
      throw classifyTelegramError(error);
    }
  }
}

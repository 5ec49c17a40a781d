import { MENU_LABELS, type MenuButton } from "./texts.js";

// =============================================================================
// Inbound events
// =============================================================================
// Every update the bot reacts to is reduced to one of these before routing.

export interface Sender {
  id: number;
  username: string | null;
  firstName: string | null;
}

interface EventBase {
  chatId: number;
  from: Sender;
}

export interface CommandEvent extends EventBase {
  kind: "command";
  /** Lowercased, without the slash or @botname */
  command: string;
  /** Everything after the command, trimmed ("" when absent) */
  args: string;
}

export interface MenuEvent extends EventBase {
  kind: "menu";
  button: MenuButton;
}

export interface TextEvent extends EventBase {
  kind: "text";
  text: string;
}

export interface PhotoEvent extends EventBase {
  kind: "photo";
  /** Largest size available */
  fileId: string;
  caption?: string;
}

export interface CallbackEvent extends EventBase {
  kind: "callback";
  callbackId: string;
  data: string;
  /** Message the inline keyboard belongs to */
  messageId: number;
}

/** Stickers, documents, voice and anything else without text */
export interface OtherEvent extends EventBase {
  kind: "other";
}

export type BotEvent = CommandEvent | MenuEvent | TextEvent | PhotoEvent | CallbackEvent | OtherEvent;
export type MessageEvent = Exclude<BotEvent, CallbackEvent>;

const MENU_BY_LABEL = new Map<string, MenuButton>(
  Object.entries(MENU_LABELS).flatMap(([button, label]) =>
    isMenuButton(button) ? [[label, button] as const] : []
  )
);

function isMenuButton(value: string): value is MenuButton {
  return value in MENU_LABELS;
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/;

export interface InboundMessage {
  text?: string;
  photoFileId?: string;
  caption?: string;
}

/**
 * Reduce a chat message to a tagged event: command, menu button, text,
 * photo or other.
 */
export function classifyMessage(chatId: number, from: Sender, message: InboundMessage): MessageEvent {
  if (message.photoFileId !== undefined) {
    return message.caption === undefined
      ? { kind: "photo", chatId, from, fileId: message.photoFileId }
      : { kind: "photo", chatId, from, fileId: message.photoFileId, caption: message.caption };
  }

  if (message.text === undefined) {
    return { kind: "other", chatId, from };
  }

  const text = message.text;
  const command = COMMAND_PATTERN.exec(text.trim());
  if (command) {
    return {
      kind: "command",
      chatId,
      from,
      command: (command[1] ?? "").toLowerCase(),
      args: (command[2] ?? "").trim(),
    };
  }

  const button = MENU_BY_LABEL.get(text.trim());
  if (button) {
    return { kind: "menu", chatId, from, button };
  }

  return { kind: "text", chatId, from, text };
}

export function callbackEvent(
  chatId: number,
  from: Sender,
  callbackId: string,
  data: string,
  messageId: number
): CallbackEvent {
  return { kind: "callback", chatId, from, callbackId, data, messageId };
}

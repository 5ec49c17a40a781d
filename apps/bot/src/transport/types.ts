import type { MembershipStatus } from "../domain/subscription/types.js";

// =============================================================================
// Keyboards
// =============================================================================
// Neutral description of reply markup; the Telegram adapter renders it.

export type InlineButton =
  | { text: string; callbackData: string }
  | { text: string; url: string };

export interface InlineKeyboard {
  type: "inline";
  rows: InlineButton[][];
}

export interface ReplyKeyboard {
  type: "reply";
  rows: string[][];
}

export interface RemoveKeyboard {
  type: "remove";
}

export type Keyboard = InlineKeyboard | ReplyKeyboard | RemoveKeyboard;

// =============================================================================
// Transport
// =============================================================================

export interface SendOptions {
  keyboard?: Keyboard;
}

export interface EditOptions {
  /** Telegram only allows inline keyboards on edited messages */
  keyboard?: InlineKeyboard;
}

export interface AnswerCallbackOptions {
  alert?: boolean;
}

export interface SentMessage {
  messageId: number;
}

export interface BotIdentity {
  id: number;
  username: string;
}

export interface BotCommand {
  command: string;
  description: string;
}

/**
 * Outbound chat operations. Every failure surfaces as a TransportError.
 */
export interface Transport {
  readonly name: string;
  sendText(chatId: number, text: string, options?: SendOptions): Promise<SentMessage>;
  sendPhoto(chatId: number, fileId: string, caption?: string, options?: SendOptions): Promise<SentMessage>;
  editText(chatId: number, messageId: number, text: string, options?: EditOptions): Promise<void>;
  answerCallback(callbackId: string, text?: string, options?: AnswerCallbackOptions): Promise<void>;
  getMembershipStatus(channel: string, userId: number): Promise<MembershipStatus>;
  getMe(): Promise<BotIdentity>;
  setCommands(commands: BotCommand[]): Promise<void>;
}

import type { MembershipStatus } from "../domain/subscription/types.js";
import { TransportError, type TransportErrorKind } from "./errors.js";
import type {
  AnswerCallbackOptions,
  BotCommand,
  BotIdentity,
  EditOptions,
  SendOptions,
  SentMessage,
  Transport,
} from "./types.js";

export type RecordedCall =
  | { method: "sendText"; chatId: number; text: string; options?: SendOptions; messageId: number }
  | { method: "sendPhoto"; chatId: number; fileId: string; caption?: string; options?: SendOptions; messageId: number }
  | { method: "editText"; chatId: number; messageId: number; text: string; options?: EditOptions }
  | { method: "answerCallback"; callbackId: string; text?: string; options?: AnswerCallbackOptions }
  | { method: "getMembershipStatus"; channel: string; userId: number };

type CallOf<M extends RecordedCall["method"]> = Extract<RecordedCall, { method: M }>;

/**
 * In-process transport that records every call.
 * Failures and membership answers are scripted per chat / user.
 */
export class MockTransport implements Transport {
  name = "mock";
  readonly calls: RecordedCall[] = [];
  private messageCounter = 0;
  private deliveryFailures = new Map<number, TransportError>();
  private editFailures: TransportError[] = [];
  private memberships = new Map<number, MembershipStatus>();
  private membershipFailure: Error | null = null;
  commands: BotCommand[] = [];

  constructor(private readonly identity: BotIdentity = { id: 1, username: "nestfinder_test_bot" }) {}

  // ---------------------------------------------------------------------------
  // Scripting
  // ---------------------------------------------------------------------------

  /** Every send to `chatId` fails with the given kind */
  failDeliveryTo(chatId: number, kind: TransportErrorKind, code: string = kind === "forbidden" ? "403" : "500"): void {
    this.deliveryFailures.set(chatId, new TransportError(kind, code, `simulated ${kind}`));
  }

  /** The next editText call fails with the given kind */
  failNextEdit(kind: TransportErrorKind, code: string = "400"): void {
    this.editFailures.push(new TransportError(kind, code, `simulated ${kind}`));
  }

  setMembership(userId: number, status: MembershipStatus): void {
    this.memberships.set(userId, status);
  }

  /** Membership lookups throw until cleared with null */
  failMembership(error: Error | null): void {
    this.membershipFailure = error;
  }

  // ---------------------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------------------

  callsOf<M extends RecordedCall["method"]>(method: M): CallOf<M>[] {
    return this.calls.filter((call): call is CallOf<M> => call.method === method);
  }

  lastText(): string | undefined {
    const texts = this.calls.flatMap((call) =>
      call.method === "sendText" || call.method === "editText" ? [call.text] : []
    );
    return texts[texts.length - 1];
  }

  reset(): void {
    this.calls.length = 0;
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  async sendText(chatId: number, text: string, options?: SendOptions): Promise<SentMessage> {
    this.throwIfFailing(chatId);
    const messageId = this.nextMessageId();
    this.calls.push({ method: "sendText", chatId, text, options, messageId });
    return { messageId };
  }

  async sendPhoto(chatId: number, fileId: string, caption?: string, options?: SendOptions): Promise<SentMessage> {
    this.throwIfFailing(chatId);
    const messageId = this.nextMessageId();
    this.calls.push({ method: "sendPhoto", chatId, fileId, caption, options, messageId });
    return { messageId };
  }

  async editText(chatId: number, messageId: number, text: string, options?: EditOptions): Promise<void> {
    const failure = this.editFailures.shift();
    if (failure) throw failure;
    this.calls.push({ method: "editText", chatId, messageId, text, options });
  }

  async answerCallback(callbackId: string, text?: string, options?: AnswerCallbackOptions): Promise<void> {
    this.calls.push({ method: "answerCallback", callbackId, text, options });
  }

  async getMembershipStatus(channel: string, userId: number): Promise<MembershipStatus> {
    this.calls.push({ method: "getMembershipStatus", channel, userId });
    if (this.membershipFailure) throw this.membershipFailure;
    return this.memberships.get(userId) ?? "left";
  }

  async getMe(): Promise<BotIdentity> {
    return this.identity;
  }

  async setCommands(commands: BotCommand[]): Promise<void> {
    this.commands = commands;
  }

  private throwIfFailing(chatId: number): void {
    const failure = this.deliveryFailures.get(chatId);
    if (failure) throw failure;
  }

  private nextMessageId(): number {
    this.messageCounter++;
    return this.messageCounter;
  }
}

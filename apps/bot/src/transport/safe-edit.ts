import { log, logFailure } from "../logger.js";
import { toTransportError } from "./errors.js";
import type { InlineKeyboard, Transport } from "./types.js";

export interface EditTarget {
  chatId: number;
  messageId: number;
  /** Callback that triggered the edit; answered once the edit settles */
  callbackId?: string;
}

export type EditOutcome = "edited" | "unchanged" | "resent" | "lost";

/**
 * Edit a message in place.
 *
 * Identical content is a no-op. Any other edit failure (message too old,
 * deleted, not editable) falls back to sending the text as a new message.
 */
export async function safeEdit(
  transport: Transport,
  target: EditTarget,
  text: string,
  keyboard?: InlineKeyboard
): Promise<EditOutcome> {
  const outcome = await editOrResend(transport, target, text, keyboard);
  if (target.callbackId !== undefined) {
    await answerQuietly(transport, target.callbackId);
  }
  return outcome;
}

async function editOrResend(
  transport: Transport,
  target: EditTarget,
  text: string,
  keyboard?: InlineKeyboard
): Promise<EditOutcome> {
  try {
    await transport.editText(target.chatId, target.messageId, text, { keyboard });
    return "edited";
  } catch (error) {
    const failure = toTransportError(error);
    if (failure.kind === "not_modified") {
      return "unchanged";
    }
    log.transport.warn(
      { chatId: target.chatId, messageId: target.messageId, code: failure.code, error: failure.message },
      "edit failed, sending new message"
    );
  }

  try {
    await transport.sendText(target.chatId, text, { keyboard });
    return "resent";
  } catch (error) {
    logFailure("transport", "edit fallback failed", error, { chatId: target.chatId });
    return "lost";
  }
}

/** Stops the client-side spinner; failures only matter for debugging */
export async function answerQuietly(
  transport: Transport,
  callbackId: string,
  text?: string,
  alert?: boolean
): Promise<void> {
  try {
    await transport.answerCallback(callbackId, text, alert === undefined ? undefined : { alert });
  } catch (error) {
    log.transport.debug({ callbackId, error: toTransportError(error).message }, "callback answer failed");
  }
}

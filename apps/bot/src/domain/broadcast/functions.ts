/**
 * Broadcast pure functions: outcome classification, tallying and reporting.
 */

import type { TransportErrorKind } from "../../transport/errors.js";
import type {
  BroadcastDraftInput,
  DeliveryOutcome,
  DeliveryReport,
  DeliveryTally,
  ParsedBroadcastContent,
} from "./types.js";

export function createTally(total: number): DeliveryTally {
  return { total, sent: 0, blocked: 0, failed: 0 };
}

export function recordOutcome(tally: DeliveryTally, outcome: DeliveryOutcome): DeliveryTally {
  return { ...tally, [outcome]: tally[outcome] + 1 };
}

export function processedCount(tally: DeliveryTally): number {
  return tally.sent + tally.blocked + tally.failed;
}

/**
 * Progress is emitted after every `every`-th processed recipient.
 */
export function shouldReportProgress(processed: number, every: number): boolean {
  return processed > 0 && processed % every === 0;
}

/**
 * sent / processed, or 0 when nothing was processed.
 */
export function successRatio(tally: DeliveryTally): number {
  const processed = processedCount(tally);
  return processed === 0 ? 0 : tally.sent / processed;
}

export function buildReport(tally: DeliveryTally): DeliveryReport {
  return {
    total: tally.total,
    sent: tally.sent,
    blocked: tally.blocked,
    failed: tally.failed,
    successRatio: successRatio(tally),
  };
}

/**
 * A forbidden recipient is permanent and gets blocked; every other failure is
 * counted and never retried.
 */
export function outcomeForErrorKind(kind: TransportErrorKind): Exclude<DeliveryOutcome, "sent"> {
  return kind === "forbidden" ? "blocked" : "failed";
}

/**
 * Text, or a photo with an optional caption. Whitespace-only text is empty.
 */
export function parseBroadcastContent(input: BroadcastDraftInput): ParsedBroadcastContent {
  if (input.photoFileId) {
    const caption = input.caption?.trim();
    return {
      ok: true,
      content: caption
        ? { kind: "photo", fileId: input.photoFileId, caption: input.caption }
        : { kind: "photo", fileId: input.photoFileId },
    };
  }

  if (input.text !== undefined && input.text.trim() !== "") {
    return { ok: true, content: { kind: "text", text: input.text } };
  }

  return { ok: false, reason: "empty" };
}

/**
 * Broadcast run types.
 */

import type { BroadcastStats } from "@nestfinder/db";

/** Payload fixed for the whole run */
export type BroadcastContent =
  | { kind: "text"; text: string }
  | { kind: "photo"; fileId: string; caption?: string };

/** One row of the recipient snapshot */
export interface Recipient {
  deliveryId: number;
  userId: number;
  tgId: number;
}

export type DeliveryOutcome = "sent" | "blocked" | "failed";

export interface DeliveryTally {
  total: number;
  sent: number;
  blocked: number;
  failed: number;
}

export type DeliveryReport = BroadcastStats;

/** Raw admin input a broadcast is composed from */
export interface BroadcastDraftInput {
  text?: string;
  photoFileId?: string;
  caption?: string;
}

export type ParsedBroadcastContent =
  | { ok: true; content: BroadcastContent }
  | { ok: false; reason: "empty" };

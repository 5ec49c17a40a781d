import type { BroadcastContent } from "../domain/broadcast/types.js";
import type { DeliveryCounts } from "./types.js";

/**
 * Aliases are stored and compared lowercased and trimmed. Embedded PGlite
 * runs under the C locale, where SQL lower() folds ASCII only, so case
 * folding happens here for both engines.
 */
export function normalizeAlias(input: string): string {
  return input.trim().toLowerCase();
}

/** Length in characters, as SQL length()/substr() count them */
export function charLength(value: string): number {
  return [...value].length;
}

export function emptyDeliveryCounts(): DeliveryCounts {
  return { queued: 0, sent: 0, blocked: 0, failed: 0 };
}

/** Column values a broadcast's content is stored as */
export function contentColumns(content: BroadcastContent) {
  return content.kind === "photo"
    ? { kind: "photo" as const, body: content.caption ?? null, photoFileId: content.fileId }
    : { kind: "text" as const, body: content.text, photoFileId: null };
}

export const DELIVERY_INSERT_CHUNK = 500;

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

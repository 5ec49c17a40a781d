import type { MembershipStatus, SubscriptionCacheEntry } from "./types.js";

const SUBSCRIBED_STATUSES: ReadonlySet<MembershipStatus> = new Set([
  "member",
  "administrator",
  "creator",
]);

export function isSubscribedStatus(status: MembershipStatus): boolean {
  return SUBSCRIBED_STATUSES.has(status);
}

/**
 * An entry is served from cache while strictly younger than the TTL.
 */
export function isFresh(
  entry: SubscriptionCacheEntry | undefined,
  ttlMs: number,
  now: number
): entry is SubscriptionCacheEntry {
  return entry !== undefined && now - entry.checkedAt < ttlMs;
}

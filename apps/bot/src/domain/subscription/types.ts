export interface SubscriptionCacheEntry {
  subscribed: boolean;
  checkedAt: number;
}

/** Channel membership status as reported by the chat platform */
export type MembershipStatus =
  | "creator"
  | "administrator"
  | "member"
  | "restricted"
  | "left"
  | "kicked";

export const DEFAULT_SUBSCRIPTION_TTL_MS = 300_000;

import {
  DEFAULT_SUBSCRIPTION_TTL_MS,
  isFresh,
  isSubscribedStatus,
  type SubscriptionCacheEntry,
} from "../domain/subscription/index.js";
import { Mutex } from "../domain/utils/index.js";
import { log } from "../logger.js";
import { subscriptionChecksTotal } from "../metrics.js";
import type { Transport } from "../transport/types.js";

export type SubscriptionCheck = () => Promise<boolean>;

/**
 * TTL cache in front of the channel membership lookup.
 *
 * Lookup errors resolve to "not subscribed" and are never cached, so the
 * next call asks again.
 */
export class SubscriptionCache {
  private readonly entries = new Map<number, SubscriptionCacheEntry>();
  private readonly mutex = new Mutex();

  constructor(private readonly ttlMs: number = DEFAULT_SUBSCRIPTION_TTL_MS) {}

  async isSubscribed(userId: number, now: number, check: SubscriptionCheck): Promise<boolean> {
    const cached = await this.mutex.runExclusive(() => this.entries.get(userId));
    if (isFresh(cached, this.ttlMs, now)) {
      subscriptionChecksTotal.inc({ result: "cached" });
      return cached.subscribed;
    }

    let subscribed: boolean;
    try {
      subscribed = await check();
    } catch (error) {
      subscriptionChecksTotal.inc({ result: "error" });
      log.subscription.warn(
        { userId, error: error instanceof Error ? error.message : String(error) },
        "subscription check failed"
      );
      return false;
    }

    subscriptionChecksTotal.inc({ result: subscribed ? "subscribed" : "not_subscribed" });
    await this.mutex.runExclusive(() => {
      this.entries.set(userId, { subscribed, checkedAt: now });
    });
    return subscribed;
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => this.entries.clear());
  }

  async size(): Promise<number> {
    return this.mutex.runExclusive(() => this.entries.size);
  }
}

/**
 * Membership lookup against `channel` for one user. Errors propagate so the
 * cache can tell them apart from "not subscribed".
 */
export function membershipCheck(
  transport: Pick<Transport, "getMembershipStatus">,
  channel: string,
  userId: number
): SubscriptionCheck {
  return async () => isSubscribedStatus(await transport.getMembershipStatus(channel, userId));
}

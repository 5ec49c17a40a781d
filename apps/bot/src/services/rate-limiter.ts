import {
  createEntry,
  DEFAULT_RATE_LIMIT,
  evaluateAdmission,
  type RateLimitConfig,
  type RateLimitEntry,
} from "../domain/rate-limit/index.js";
import { Mutex, SystemTimeProvider, type TimeProvider } from "../domain/utils/index.js";
import { log } from "../logger.js";
import { botRateLimitedTotal } from "../metrics.js";

export interface RateLimiterStats {
  trackedUsers: number;
  blockedUsers: number;
}

/**
 * Per-user anti-spam gate.
 *
 * A user who reaches the threshold inside the window lands in the block set
 * and stays there until reset(); there is no expiry.
 */
export class RateLimiter {
  private readonly entries = new Map<number, RateLimitEntry>();
  private readonly blocked = new Set<number>();
  private readonly mutex = new Mutex();
  private readonly config: RateLimitConfig;

  constructor(
    config: Partial<RateLimitConfig> = {},
    private readonly time: TimeProvider = new SystemTimeProvider()
  ) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
  }

  async admit(userId: number, now: number = this.time.now()): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const decision = evaluateAdmission(
        this.entries.get(userId) ?? createEntry(),
        this.blocked.has(userId),
        this.config,
        now
      );
      this.entries.set(userId, decision.entry);

      if (decision.admitted) {
        return true;
      }

      botRateLimitedTotal.inc({ reason: decision.reason });
      if (decision.reason === "threshold") {
        this.blocked.add(userId);
        log.rateLimit.warn(
          { userId, events: decision.entry.timestamps.length, windowMs: this.config.windowMs },
          "user blocked for spam"
        );
      }
      return false;
    });
  }

  async isBlocked(userId: number): Promise<boolean> {
    return this.mutex.runExclusive(() => this.blocked.has(userId));
  }

  /** Forget every sequence and unblock everyone */
  async reset(): Promise<void> {
    await this.mutex.runExclusive(() => {
      const blockedUsers = this.blocked.size;
      this.entries.clear();
      this.blocked.clear();
      log.rateLimit.info({ blockedUsers }, "rate limit state cleared");
    });
  }

  async stats(): Promise<RateLimiterStats> {
    return this.mutex.runExclusive(() => ({
      trackedUsers: this.entries.size,
      blockedUsers: this.blocked.size,
    }));
  }
}

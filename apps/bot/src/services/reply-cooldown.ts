import { DEFAULT_REPLY_COOLDOWN_MS, isRepeatWithin } from "../domain/rate-limit/index.js";
import { Mutex } from "../domain/utils/index.js";

/**
 * Remembers when a keyed reply last went out so a repeat inside the window
 * can be skipped. Cleared together with the other caches.
 */
export class ReplyCooldown {
  private readonly sentAt = new Map<string, number>();
  private readonly mutex = new Mutex();

  constructor(private readonly windowMs: number = DEFAULT_REPLY_COOLDOWN_MS) {}

  /** True when the reply may go out; the send time is recorded. */
  async tryAcquire(key: string, now: number): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      if (isRepeatWithin(this.sentAt.get(key), this.windowMs, now)) {
        return false;
      }
      this.sentAt.set(key, now);
      return true;
    });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => this.sentAt.clear());
  }

  async size(): Promise<number> {
    return this.mutex.runExclusive(() => this.sentAt.size);
  }
}

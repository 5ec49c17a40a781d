/**
 * Rate limit pure functions.
 * Block-set membership is owned by the caller; these only decide.
 */

import type {
  AdmissionDecision,
  RateLimitConfig,
  RateLimitEntry,
} from "./types.js";

export function createEntry(): RateLimitEntry {
  return { timestamps: [], lastAdmittedAt: null };
}

export function isRepeatWithin(
  lastSentAt: number | undefined,
  windowMs: number,
  now: number
): boolean {
  return lastSentAt !== undefined && now - lastSentAt < windowMs;
}

/**
 * Keep timestamps inside [now - windowMs, now].
 */
export function pruneWindow(
  timestamps: number[],
  windowMs: number,
  now: number
): number[] {
  const windowStart = now - windowMs;
  return timestamps.filter((ts) => ts >= windowStart && ts <= now);
}

export function isInCooldown(
  entry: RateLimitEntry,
  cooldownMs: number,
  now: number
): boolean {
  return entry.lastAdmittedAt !== null && now - entry.lastAdmittedAt < cooldownMs;
}

/**
 * Decide whether an event at `now` is admitted.
 *
 * Order matters: a cooldown rejection is not recorded and does not count
 * towards the threshold; reaching the threshold is reported as "threshold"
 * so the caller can move the user into the block set.
 */
export function evaluateAdmission(
  entry: RateLimitEntry,
  blocked: boolean,
  config: RateLimitConfig,
  now: number
): AdmissionDecision {
  if (blocked) {
    return { admitted: false, reason: "blocked", entry };
  }

  const pruned: RateLimitEntry = {
    timestamps: pruneWindow(entry.timestamps, config.windowMs, now),
    lastAdmittedAt: entry.lastAdmittedAt,
  };

  if (isInCooldown(pruned, config.cooldownMs, now)) {
    return { admitted: false, reason: "cooldown", entry: pruned };
  }

  if (pruned.timestamps.length >= config.threshold) {
    return { admitted: false, reason: "threshold", entry: pruned };
  }

  return {
    admitted: true,
    entry: { timestamps: [...pruned.timestamps, now], lastAdmittedAt: now },
  };
}

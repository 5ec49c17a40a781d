/**
 * Anti-spam sliding window types.
 */

export interface RateLimitConfig {
  /** Admitted events allowed inside the window before the user is blocked */
  threshold: number;
  /** Sliding window size in ms */
  windowMs: number;
  /** Minimum gap between two admitted events in ms */
  cooldownMs: number;
}

export interface RateLimitEntry {
  /** Admitted event timestamps inside the window */
  timestamps: number[];
  /** Timestamp of the last admitted event, null before the first one */
  lastAdmittedAt: number | null;
}

export type RejectReason = "blocked" | "cooldown" | "threshold";

export type AdmissionDecision =
  | { admitted: true; entry: RateLimitEntry }
  | { admitted: false; reason: RejectReason; entry: RateLimitEntry };

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  threshold: 5,
  windowMs: 10_000,
  cooldownMs: 2_000,
};

/** Window in which a repeated help reply to the same user is skipped */
export const DEFAULT_REPLY_COOLDOWN_MS = 5_000;

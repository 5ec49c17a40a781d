import { Counter, Gauge, Histogram, collectDefaultMetrics, register } from "prom-client";
import { config } from "./config.js";

// Default process metrics (CPU, memory, event loop). Tests run with METRICS_ENABLED=false.
if (config.METRICS_ENABLED) {
  collectDefaultMetrics({
    prefix: "bot_",
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

export { register };

// ============================================
// Update Handling Metrics
// ============================================

/**
 * Counter: Updates handled
 * Labels: route (start/help/city_text/callback_city/...)
 */
export const botUpdatesTotal = new Counter({
  name: "bot_updates_total",
  help: "Total number of updates routed to a handler",
  labelNames: ["route"],
});

/**
 * Counter: Events dropped by the anti-spam gate
 * Labels: reason (blocked/cooldown/threshold)
 */
export const botRateLimitedTotal = new Counter({
  name: "bot_rate_limited_total",
  help: "Total number of events rejected by the rate limiter",
  labelNames: ["reason"],
});

/**
 * Counter: Channel membership lookups
 * Labels: result (subscribed/not_subscribed/error/cached)
 */
export const subscriptionChecksTotal = new Counter({
  name: "subscription_checks_total",
  help: "Total number of subscription checks",
  labelNames: ["result"],
});

// ============================================
// Broadcast Metrics
// ============================================

/**
 * Counter: Delivery attempts
 * Labels: outcome (sent/blocked/failed)
 */
export const broadcastDeliveriesTotal = new Counter({
  name: "broadcast_deliveries_total",
  help: "Total number of broadcast delivery attempts",
  labelNames: ["outcome"],
});

/**
 * Histogram: Wall time of a whole broadcast run
 */
export const broadcastDuration = new Histogram({
  name: "broadcast_duration_seconds",
  help: "Duration of broadcast runs",
  buckets: [1, 5, 10, 30, 60, 120, 300, 600, 1800],
});

/**
 * Gauge: Broadcast runs currently active (0 or 1)
 */
export const broadcastsInProgress = new Gauge({
  name: "broadcasts_in_progress",
  help: "Number of broadcasts currently running",
});

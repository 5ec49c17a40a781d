export * from "./rate-limiter.js";
export * from "./subscription-cache.js";
export * from "./reply-cooldown.js";
export * from "./session-store.js";
export * from "./city-resolver.js";
export * from "./broadcast-engine.js";
export * from "./broadcast-runner.js";
export * from "./broadcast-recovery.js";

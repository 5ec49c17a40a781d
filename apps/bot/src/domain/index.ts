/**
 * Domain layer - pure logic with no I/O.
 *
 * Services wrap these functions with state, locking, persistence and logging.
 */

export * from "./utils/index.js";
export * from "./rate-limit/index.js";
export * from "./subscription/index.js";
export * from "./session/index.js";
export * from "./broadcast/index.js";

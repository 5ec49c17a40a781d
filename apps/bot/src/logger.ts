import { pino, type LoggerOptions } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// Every inbound update runs inside its own trace, so all logs written while
// handling it (dispatch, repository, transport) share one traceId.
//
// Usage:
//   await withTraceAsync(async () => {
//     log.dispatch.info({ route }, "handled");   // traceId added automatically
//   });
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

// Short, unique trace ID (12 chars, base64url)
function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

/**
 * Run a function with a trace context. All logs within will include the traceId.
 * If no traceId is provided, a new one is generated.
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.broadcast.info({ broadcastId, recipients: 120 }, "started")
//
// FAILURE (detailed, error level):
//   log.transport.error({ chatId, error: err.message, code }, "send failed")
//
// DEBUG (verbose, only in dev):
//   log.session.debug({ userId, state }, "entered")
//
// =============================================================================

const baseConfig: LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

// Pretty printing only in development
export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Bot lifecycle (commands registration, start notice)
  bot: logger.child({ component: "bot" }),

  // Update routing and handlers
  dispatch: logger.child({ component: "dispatch" }),

  // Anti-spam gate
  rateLimit: logger.child({ component: "rate-limiter" }),

  // Channel membership checks
  subscription: logger.child({ component: "subscription" }),

  // Per-user FSM
  session: logger.child({ component: "session" }),

  // City lookup
  city: logger.child({ component: "city" }),

  // Broadcast runs
  broadcast: logger.child({ component: "broadcast" }),

  // Outbound Telegram calls
  transport: logger.child({ component: "transport" }),

  // Database operations
  db: logger.child({ component: "db" }),

  // System-level events
  system: logger.child({ component: "system" }),

  // HTTP surface (health, metrics, webhook)
  api: logger.child({ component: "api" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a successful operation with minimal context
 */
export function logSuccess(
  component: LogComponent,
  event: string,
  context: Record<string, unknown>
): void {
  log[component].info(context, event);
}

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Log a warning for unexpected but non-critical issues
 */
export function logWarning(
  component: LogComponent,
  event: string,
  context: Record<string, unknown>
): void {
  log[component].warn(context, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}

export default log;

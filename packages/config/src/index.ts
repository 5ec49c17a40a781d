import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/**
 * Telegram bot tokens look like `<numeric bot id>:<secret of 35+ chars>`.
 */
export const BOT_TOKEN_PATTERN = /^\d+:[^:]{35,}$/;

// Empty strings in .env files mean "unset"
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val));

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  // ===========================================================================
  // Telegram
  // ===========================================================================
  BOT_TOKEN: z
    .string({ required_error: "BOT_TOKEN is required (get one from @BotFather)" })
    .regex(BOT_TOKEN_PATTERN, "BOT_TOKEN must look like 123456789:ABC-DEF1234ghIkl-zyx57W2v1u123ew11"),
  /** The single administrator identity; 0 disables every admin operation */
  ADMIN_ID: z.coerce.number().int().nonnegative().default(0),
  MAIN_CHANNEL: z.string().min(1).default("@nestfinder_ua"),
  MAIN_CHANNEL_LINK: z.string().url().default("https://t.me/nestfinder_ua"),
  ADMIN_CONTACT: z.string().min(1).default("nestfinder_admin"),

  /** polling: long polling through @grammyjs/runner. webhook: updates arrive over HTTP */
  TRANSPORT_MODE: z.enum(["polling", "webhook"]).default("polling"),
  PUBLIC_URL: optionalString.pipe(z.string().url().optional()),
  WEBHOOK_PATH: z.string().startsWith("/").default("/telegram/webhook"),
  WEBHOOK_SECRET: optionalString,

  // ===========================================================================
  // Database
  // PostgreSQL server when DATABASE_URL is set, embedded PGlite otherwise
  // ===========================================================================
  DATABASE_URL: optionalString.pipe(z.string().url().optional()),
  // Embedded PGlite data directory, used when DATABASE_URL is unset
  PGLITE_DATA_DIR: z.string().min(1).default("./pgdata"),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),
  SEED_CITIES: stringBoolean.default(true),

  // ===========================================================================
  // Anti-spam
  // ===========================================================================
  RATE_LIMIT_THRESHOLD: z.coerce.number().int().min(1).default(5),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).default(10_000),
  MESSAGE_COOLDOWN_MS: z.coerce.number().int().min(0).default(2_000),
  HELP_COOLDOWN_MS: z.coerce.number().int().min(0).default(5_000),

  // ===========================================================================
  // Subscription check
  // ===========================================================================
  SUBSCRIPTION_CACHE_TTL_MS: z.coerce.number().int().min(0).default(300_000),

  // ===========================================================================
  // Broadcasts
  // ===========================================================================
  /** Pause after every delivery attempt, keeps us under Telegram's outbound limits */
  BROADCAST_DELAY_MS: z.coerce.number().int().min(0).default(50),
  BROADCAST_PROGRESS_EVERY: z.coerce.number().int().min(1).default(10),

  // ===========================================================================
  // Server
  // ===========================================================================
  PORT: z.coerce.number().default(6001),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  METRICS_ENABLED: stringBoolean.default(true),
}).superRefine((cfg, ctx) => {
  if (cfg.TRANSPORT_MODE === "webhook" && !cfg.PUBLIC_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["PUBLIC_URL"],
      message: "PUBLIC_URL is required when TRANSPORT_MODE=webhook",
    });
  }
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}

/** Singleton config instance */
export const config = loadConfig();

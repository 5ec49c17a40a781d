import Fastify, { type FastifyInstance } from "fastify";
import type { createWebhookHandler } from "../bot/grammy.js";
import { config } from "../config.js";
import { log } from "../logger.js";
import { register } from "../metrics.js";
import type { Repository } from "../repository/types.js";

export interface WebhookRoute {
  path: string;
  handler: ReturnType<typeof createWebhookHandler>;
}

export interface ServerOptions {
  repository: Pick<Repository, "ping" | "dialect">;
  metricsEnabled?: boolean;
  webhook?: WebhookRoute;
}

/**
 * Health, metrics and (in webhook mode) the Telegram update endpoint.
 */
export function buildServer(options: ServerOptions): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own structured logger
  });

  // Global error handler - prevent stack trace leakage in production
  app.setErrorHandler((error, request, reply) => {
    log.api.error(
      {
        error: error.message,
        url: request.url,
        method: request.method,
        requestId: request.id,
      },
      "unhandled error"
    );

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: statusCode === 500 && config.NODE_ENV === "production" ? "Internal server error" : error.message,
      requestId: request.id,
    });
  });

  // Health check endpoint for container probes
  app.get("/health", async (_request, reply) => {
    let database: "ok" | "error" = "ok";
    try {
      await options.repository.ping();
    } catch (error) {
      database = "error";
      log.api.warn(
        { dialect: options.repository.dialect, error: error instanceof Error ? error.message : String(error) },
        "health check: database unreachable"
      );
    }

    const status = database === "ok" ? "ok" : "degraded";
    return reply.status(database === "ok" ? 200 : 503).send({
      status,
      timestamp: new Date().toISOString(),
      database,
    });
  });

  if (options.metricsEnabled ?? true) {
    app.get("/metrics", async (_request, reply) => {
      const body = await register.metrics();
      return reply.header("Content-Type", register.contentType).send(body);
    });
  }

  if (options.webhook) {
    app.post(options.webhook.path, options.webhook.handler);
    log.api.debug({ path: options.webhook.path }, "webhook route registered");
  }

  return app;
}

// Load environment variables from .env file (local development only)
import "dotenv/config";

import { pathToFileURL } from "node:url";
import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import recommendRoute from "./routes/recommend.js";
import { statusRoutes, ServiceStats } from "./routes/v1.status.js";
import observabilityPlugin from "./plugins/observability.js";
import { DecisionEngine } from "./decision/engine.js";
import { MockPredictionProvider } from "./decision/mock-provider.js";
import type { PredictionProvider } from "./decision/provider.js";
import { loadUserStore, type UserStore } from "./data/user-store.js";
import { SERVICE_VERSION } from "./version.js";
import { attachRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { RateLimitedError, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { getConfig } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";

export interface BuildOptions {
  /** Pre-loaded dataset; read from config.data.usersCsvPath when omitted */
  users?: UserStore;
  /** Prediction backend; the mock provider when omitted */
  provider?: PredictionProvider;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();

  // Dataset is loaded once and is read-only for the life of the process
  const users = options.users ?? (await loadUserStore(config.data.usersCsvPath));
  const engine = new DecisionEngine(options.provider ?? new MockPredictionProvider());
  const stats = new ServiceStats();

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
  });

  await app.register(cors, {
    origin: config.cors.allowedOrigins,
  });

  // Pure JSON API: CSP and cross-origin isolation headers do not apply
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  await app.register(rateLimit, {
    global: true,
    max: config.rateLimits.defaultRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({
        event: "rate_limit_hit",
        max: context.max,
        request_id: getRequestId(req),
      }, "Rate limit exceeded");
      return new RateLimitedError(retryAfter);
    },
  });

  await app.register(observabilityPlugin, {
    infoSampleRate: config.observability.infoSampleRate,
    logStack: config.observability.logStack,
  });

  app.addHook("onRequest", async (request) => {
    attachRequestId(request);
    stats.incrementRequestCount();
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Counts every 4xx/5xx, including the legacy 404 body that skips the error handler
  app.addHook("onResponse", async (_request, reply) => {
    stats.incrementErrorCount(reply.statusCode);
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      app.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    if (errorV1.code === "RATE_LIMITED" && typeof errorV1.details?.retry_after_seconds === "number") {
      reply.header("Retry-After", errorV1.details.retry_after_seconds);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: "personalization",
    version: SERVICE_VERSION,
    provider: engine.providerName,
    users_loaded: users.size,
  }));

  await statusRoutes(app, stats);
  await recommendRoute(app, { engine, users, stats });

  return app;
}

// If running directly (not imported), start the server
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const config = getConfig();

  build()
    .then(async (app) => {
      app.log.info({
        service: "personalization-recommendation-service",
        version: SERVICE_VERSION,
        users_csv_path: config.data.usersCsvPath,
        global_rate_limit_rpm: config.rateLimits.defaultRpm,
        cors_origins: config.cors.allowedOrigins,
      }, "Personalization service starting");

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}

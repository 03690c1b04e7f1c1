import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import { getConfig } from "./config/index.js";
import { healthRoutes } from "./routes/health.routes.js";
import { glossRoutes } from "./routes/gloss.routes.js";

export async function buildApp() {
  const config = getConfig();

  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    trustProxy: true,
    bodyLimit: config.bodyLimitBytes,
    connectionTimeout: 30_000,
    keepAliveTimeout: 5_000,
  });

  // ─── Plugins ────────────────────────────────────────────────────────────────

  await fastify.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  await fastify.register(cors, {
    origin: (_origin, cb) => cb(null, true),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Origin", "Accept"],
    credentials: true,
  });

  // Rate limiting — Redis if configured, otherwise in-memory
  let redisClient: import("ioredis").Redis | null = null;
  if (config.redisUrl) {
    try {
      const { Redis } = await import("ioredis");
      redisClient = new Redis(config.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
      await redisClient.connect();
      fastify.log.info("Rate limiting: Redis");
    } catch (err) {
      redisClient?.disconnect();
      redisClient = null;
      fastify.log.warn({ err }, "Redis unavailable — using in-memory rate limiting");
    }
  } else {
    fastify.log.info("Rate limiting: in-memory (REDIS_URL not set)");
  }

  await fastify.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    ...(redisClient ? { redis: redisClient } : {}),
    keyGenerator: (request) => `ip:${request.ip}`,
    errorResponseBuilder: (_request, context) => ({
      data: null,
      errors: [{ code: "RATE_LIMITED", message: `Too many requests. Retry after ${Math.ceil(context.ttl / 1000)}s.` }],
    }),
  });

  if (redisClient) {
    const client = redisClient;
    fastify.addHook("onClose", async () => {
      await client.quit();
    });
  }

  // ─── OpenAPI ─────────────────────────────────────────────────────────────────

  await fastify.register(swagger, {
    openapi: {
      info: { title: "Glossa API", description: "Interlinear gloss rendering", version: "1.0.0" },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes);
  await fastify.register(glossRoutes);

  // ─── Error handlers ──────────────────────────────────────────────────────────

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error, requestId: request.id }, "Unhandled error");
    } else {
      request.log.info({ err: error, requestId: request.id }, "Request rejected");
    }
    void reply.code(statusCode).send({
      data: null,
      requestId: request.id,
      errors: [{
        code: error.code ?? "INTERNAL_ERROR",
        message: statusCode >= 500 ? "An internal server error occurred." : error.message,
      }],
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send({
      data: null,
      requestId: request.id,
      errors: [{ code: "NOT_FOUND", message: `${request.method} ${request.url} not found.` }],
    });
  });

  return fastify;
}

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { PhrasedrillError } from "@phrasedrill/shared-types";

import { getConfig } from "./config/index.js";
import { echoRequestId, generateRequestId } from "./middleware/request-id.js";
import { healthRoutes } from "./routes/health.routes.js";
import { drillRoutes } from "./routes/drill.routes.js";

export async function buildApp() {
  const config = getConfig();

  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    genReqId: generateRequestId,
    trustProxy: true,
    bodyLimit: 1024 * 1024, // 1 MB; drill files carry the whole vocabulary
    keepAliveTimeout: 5_000,
  });

  fastify.addHook("onRequest", echoRequestId);

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

  // Rate limiting: Redis if configured, otherwise in-memory
  let redisClient: import("ioredis").Redis | null = null;
  if (config.redisUrl) {
    const { Redis } = await import("ioredis");
    const client = new Redis(config.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
    client.on("error", (err: Error) => fastify.log.warn({ err }, "Redis connection error"));
    try {
      await client.connect();
      redisClient = client;
      fastify.log.info("Rate limiting: Redis");
    } catch (err) {
      // Stop ioredis from reconnecting in the background once we fall back
      client.disconnect();
      fastify.log.warn({ err }, "Redis unavailable, using in-memory rate limiting");
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
      info: { title: "Phrasedrill API", description: "Vocabulary drill sentence generator", version: "0.1.0" },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes);
  await fastify.register(drillRoutes);

  // ─── Error handlers ──────────────────────────────────────────────────────────

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error instanceof PhrasedrillError ? error.statusCode : (error.statusCode ?? 500);
    if (statusCode >= 500) {
      fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    } else {
      fastify.log.warn({ err: error, requestId: request.id }, "Request failed");
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
      errors: [{ code: "NOT_FOUND", message: `${request.method} ${request.url} not found.` }],
    });
  });

  return fastify;
}

import Fastify from "fastify";
import type { FastifyError, FastifyInstance, FastifyRequest } from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import type { Config } from "./config.js";
import { ShortServiceError, statusCodeFor } from "./errors.js";
import { KeyStore } from "./key_store.js";
import { createMetrics, keyStoreListener } from "./metrics.js";
import type { Metrics } from "./metrics.js";
import { getOrCreateRequestId } from "./request_id.js";
import { newMemoryService } from "./service.js";

export interface BuildAppOptions {
  config: Config;
  metrics?: Metrics;
}

const errorBody = {
  type: "object",
  properties: { error: { type: "string" } }
} as const;

const CLIENT_ERRORS: Record<number, string> = {
  400: "bad_request",
  404: "not_found",
  413: "payload_too_large",
  415: "unsupported_media_type",
  429: "rate_limited"
};

export async function buildApp({ config, metrics = createMetrics() }: BuildAppOptions): Promise<FastifyInstance> {
  const startedAt = new Date().toISOString();
  const buildInfo = { ...config.build, started_at: startedAt };

  const app = Fastify({
    logger: {
      level: config.logLevel
    },
    bodyLimit: config.bodyLimitBytes,
    routerOptions: {
      // Percent-encoding can triple a key's length; the store enforces maxLen.
      maxParamLength: 3 * config.maxLen
    },
    ajv: {
      customOptions: { coerceTypes: false }
    },
    trustProxy: true,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  const store = new KeyStore({
    maxLen: config.maxLen,
    minKeySize: config.minKeySize,
    listener: keyStoreListener(metrics)
  });
  const service = newMemoryService({ store, logger: app.log });

  const requestStart = new WeakMap<FastifyRequest, bigint>();

  app.addHook("onRequest", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
    requestStart.set(req, process.hrtime.bigint());
  });

  app.addHook("onResponse", async (req, reply) => {
    const start = requestStart.get(req);
    if (start === undefined) return;

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };

    metrics.httpRequestsTotal.inc(labels);
    metrics.httpRequestDurationSeconds.observe(labels, durationSeconds);
  });

  await app.register(helmet, {
    contentSecurityPolicy: false
  });

  if (config.rateLimitEnabled) {
    // Limits are set per route below.
    await app.register(rateLimit, { global: false });
  }

  app.get("/health", async () => {
    return { status: "ok", ...buildInfo, entries: store.size };
  });

  app.get("/ready", async () => {
    return { status: "ready" };
  });

  app.get("/metrics", async (_req, reply) => {
    try {
      const body = await metrics.registry.metrics();
      reply.header("Content-Type", metrics.registry.contentType).code(200).send(body);
    } catch (err) {
      app.log.error({ err }, "metrics failed");
      reply.code(500).send("metrics_error");
    }
  });

  app.post<{ Body: { v: string } }>(
    "/api",
    {
      config: {
        rateLimit: { max: config.createRateLimitMax, timeWindow: config.rateLimitTimeWindowMs }
      },
      schema: {
        body: {
          type: "object",
          required: ["v"],
          properties: {
            v: { type: "string" }
          }
        },
        response: {
          200: {
            type: "object",
            properties: { k: { type: "string" } }
          },
          400: errorBody,
          429: errorBody,
          500: errorBody
        }
      }
    },
    async (req) => {
      const k = await service.create(req.body.v);
      return { k };
    }
  );

  app.get<{ Params: { key: string } }>(
    "/api/:key",
    {
      config: {
        rateLimit: { max: config.lookupRateLimitMax, timeWindow: config.rateLimitTimeWindowMs }
      },
      schema: {
        params: {
          type: "object",
          required: ["key"],
          properties: { key: { type: "string", minLength: 1 } }
        },
        response: {
          200: {
            type: "object",
            properties: { v: { type: "string" } }
          },
          400: errorBody,
          404: errorBody,
          429: errorBody,
          500: errorBody
        }
      }
    },
    async (req) => {
      const v = await service.lookup(req.params.key);
      return { v };
    }
  );

  app.setNotFoundHandler((_req, reply) => {
    return reply.code(404).send({ error: "not_found" });
  });

  app.setErrorHandler((err: FastifyError, _req, reply) => {
    if (err instanceof ShortServiceError) {
      const statusCode = statusCodeFor(err);
      if (statusCode >= 500) app.log.error({ err }, "request failed");
      return reply.code(statusCode).send({ error: err.code });
    }

    const statusCode = err.validation ? 400 : (err.statusCode ?? 500);
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: CLIENT_ERRORS[statusCode] ?? "bad_request" });
    }

    app.log.error({ err }, "request failed");
    return reply.code(500).send({ error: "internal_error" });
  });

  return app;
}

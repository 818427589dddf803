import fastify from "fastify";
import multipart from "@fastify/multipart";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { DbClient } from "@chirp/db";
import { makeErrorResponse } from "@chirp/shared";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { createMediaStorage, MediaStorage } from "./mediaStorage.js";
import { createServices } from "./services/index.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerMediaRoutes } from "./routes/medias.js";
import { registerTweetRoutes } from "./routes/tweets.js";
import { registerUserRoutes } from "./routes/users.js";

export type ServerDeps = {
  db: DbClient;
  storage?: MediaStorage;
  rateLimitMax?: number;
};

export const buildServer = (deps: ServerDeps) => {
  const storage =
    deps.storage ??
    createMediaStorage({ rootDir: config.MEDIA_ROOT, maxUploadBytes: config.MEDIA_MAX_UPLOAD_BYTES });
  const services = createServices({ db: deps.db, storage });

  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES,
    genReqId: (request) => {
      const incoming = request.headers["x-request-id"];
      return (Array.isArray(incoming) ? incoming[0] : incoming) ?? randomUUID();
    }
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", {
          devMode: config.DEV_MODE,
          debug: { cause: error.issues.map((issue) => issue.message).join("; ") }
        })
      );
    }
    const statusCode = typeof error.statusCode === "number" ? error.statusCode : 500;
    if (statusCode === 429) {
      return reply.code(429).send(makeErrorResponse("rate_limited"));
    }
    if (statusCode >= 400 && statusCode < 500) {
      // Framework rejections: malformed JSON, wrong content type, body too large.
      return reply.code(statusCode).send(
        makeErrorResponse("invalid_request", { message: error.message, devMode: config.DEV_MODE })
      );
    }
    log.error("request.failed", { requestId: request.id, error });
    return reply.code(500).send(
      makeErrorResponse("internal_error", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE ? { cause: error.message } : undefined
      })
    );
  });

  app.setNotFoundHandler((request, reply) =>
    reply.code(404).send(
      makeErrorResponse("route_not_found", {
        devMode: config.DEV_MODE,
        debug: { cause: `${request.method} ${request.url}` }
      })
    )
  );

  app.register(rateLimit, {
    max: deps.rateLimitMax ?? config.RATE_LIMIT_MAX,
    timeWindow: "1 minute"
  });
  app.register(multipart, {
    // Oversize files arrive truncated and are rejected by the media service.
    throwFileSizeLimit: false,
    limits: { fileSize: storage.maxUploadBytes, files: 1 }
  });

  registerHealthRoutes(app, { db: deps.db });
  registerTweetRoutes(app, { db: deps.db, services });
  registerMediaRoutes(app, { db: deps.db, services });
  registerUserRoutes(app, { db: deps.db, services });

  return app;
};

// src/observability/requestLogger.ts
// Request/response logging with timing.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { createLogger, createChildLogger } from "./logger.js";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  contentType?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function buildRequestContext(req: FastifyRequest): RequestContext {
  const contentType = req.headers["content-type"];

  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    contentType: typeof contentType === "string" ? contentType.split(";")[0] : undefined,
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

export function createRequestLogger(req: FastifyRequest) {
  return createChildLogger(baseLogger, buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Register request logging hooks with Fastify
 *
 * Logs:
 * - Request start (debug)
 * - Request completion with status code and duration
 * - Request errors with error details
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    createRequestLogger(req).debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
      const startTime = requestStartTimes.get(req);
      const duration = startTime ? Date.now() - startTime : 0;

      const log = createChildLogger(baseLogger, {
        ...buildRequestContext(req),
        statusCode: reply.statusCode,
        duration,
      });

      if (reply.statusCode >= 500) {
        log.error("request failed");
      } else if (reply.statusCode >= 400) {
        log.warn("request error");
      } else {
        log.info("request completed");
      }

      requestStartTimes.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    createRequestLogger(req).error(
      {
        err: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      "request error"
    );
  });
}

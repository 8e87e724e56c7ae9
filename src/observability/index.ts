// src/observability/index.ts
// Central export point for observability functionality.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger.js";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  getOrCreateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId.js";

/* ---------- Request Logger ---------- */
export { createRequestLogger, registerRequestLogger } from "./requestLogger.js";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId.js";
import { registerRequestLogger } from "./requestLogger.js";

/**
 * Register all observability hooks with Fastify
 * Call this right after creating the Fastify instance
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
}

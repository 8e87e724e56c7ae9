// src/observability/logger.ts
// Structured JSON logging - logger configuration
//
// Pino with:
// - Environment-based log levels
// - JSON output by default, pino-pretty when LOG_PRETTY=true
// - Module-scoped child loggers

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/* ---------- Configuration ---------- */

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get the configured log level from environment
 * Defaults to 'info'
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : "info";
}

export function isPrettyEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function buildRootLogger(): Logger {
  const options: pino.LoggerOptions = {
    level: getLogLevel(),
    base: {
      service: "invoice-analyzer",
      version: process.env.npm_package_version || "unknown",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isPrettyEnabled()) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(options);
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }
  return rootLogger;
}

/**
 * Create a logger instance, optionally scoped to a module
 *
 * @example
 * const log = createLogger('invoice/analyzer');
 * log.info({ contentType }, 'analysis started');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();

  if (moduleName) {
    return root.child({ module: moduleName });
  }

  return root;
}

/**
 * Create a child logger with additional context
 *
 * @example
 * const reqLog = createChildLogger(log, { requestId: 'abc123' });
 */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

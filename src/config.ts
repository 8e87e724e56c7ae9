/* src/config.ts
   Centralized process configuration, validated once at startup */
import path from 'node:path';
import 'dotenv/config';
import { z } from 'zod';

const csv = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
  );

/**
 * Environment schema.
 * BASE_URL, API_KEY and MODEL_NAME are required; the process refuses to start without them.
 * LOG_LEVEL and LOG_PRETTY are read by the logger itself (observability/logger.ts).
 */
export const envSchema = z.object({
  // ── Model endpoint ───────────────────────────────────────────────
  BASE_URL: z.string().trim().url(),
  API_KEY: z.string().trim().min(1),
  MODEL_NAME: z.string().trim().min(1),

  // ── HTTP ─────────────────────────────────────────────────────────
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(20),
  STATIC_ROOT: z.string().trim().min(1).default('public'),
  CORS_ORIGINS: csv,
});

export interface AppConfig {
  readonly model: {
    readonly baseUrl: string;
    readonly apiKey: string;
    readonly name: string;
  };
  readonly http: {
    readonly port: number;
    readonly host: string;
    readonly maxUploadBytes: number;
    readonly staticRoot: string;
    readonly corsOrigins: readonly string[];
  };
}

export class ConfigError extends Error {
  constructor(readonly fields: string[]) {
    super(`Invalid or missing environment variables: ${fields.join(', ')}`);
    this.name = 'ConfigError';
  }
}

/** Empty strings count as unset, the same as an absent variable. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

/**
 * Build the immutable process configuration.
 * Throws ConfigError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).sort();
    throw new ConfigError(fields);
  }
  const e = parsed.data;

  return Object.freeze({
    model: Object.freeze({
      baseUrl: e.BASE_URL,
      apiKey: e.API_KEY,
      name: e.MODEL_NAME,
    }),
    http: Object.freeze({
      port: e.PORT,
      host: e.HOST,
      maxUploadBytes: Math.floor(e.MAX_UPLOAD_MB * 1024 * 1024),
      staticRoot: path.resolve(process.cwd(), e.STATIC_ROOT),
      corsOrigins: Object.freeze(e.CORS_ORIGINS),
    }),
  });
}

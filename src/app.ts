// src/app.ts
// Fastify application assembly. No listening here, so tests can drive it with inject().

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import type { AppConfig } from './config.js';
import type { ChatCompletionClient } from './ai/providers/index.js';
import { InvoiceAnalysisError } from './errors.js';
import { createInvoiceAnalyzer } from './invoice/analyzer.js';
import { createLogger, registerObservability, requestIdGenerator } from './observability/index.js';
import { createAnalyzeInvoiceRoutes } from './routes/analyzeInvoice.js';
import healthRoutes from './routes/health.js';

export interface BuildAppOptions {
  config: AppConfig;
  client: ChatCompletionClient;
}

export interface ErrorBody {
  detail: string;
}

const log = createLogger('app');

/** Framework errors in the 4xx range (413, 406, ...) keep their status; everything else is a 500. */
function statusFor(error: FastifyError | InvoiceAnalysisError): number {
  if (error instanceof InvoiceAnalysisError) return error.statusCode;
  const status = error.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : 500;
}

export async function buildApp({ config, client }: BuildAppOptions): Promise<FastifyInstance> {
  // Request logging is handled by the observability hooks
  const app = Fastify({
    logger: false,
    genReqId: requestIdGenerator,
  });

  registerObservability(app);

  if (config.http.corsOrigins.length > 0) {
    await app.register(cors, {
      origin: [...config.http.corsOrigins],
      methods: ['GET', 'POST'],
    });
  }

  await app.register(multipart, {
    limits: { fileSize: config.http.maxUploadBytes },
  });

  await app.register(fastifyStatic, {
    root: config.http.staticRoot,
    prefix: '/static/',
  });

  app.setErrorHandler((error, _req, reply) => {
    const status = statusFor(error);
    const body: ErrorBody = { detail: error.message };
    return reply.code(status).send(body);
  });

  const analyzer = createInvoiceAnalyzer({ client, model: config.model.name });

  await app.register(healthRoutes);
  await app.register(createAnalyzeInvoiceRoutes(analyzer));

  log.debug(
    { model: config.model.name, staticRoot: config.http.staticRoot, cors: config.http.corsOrigins },
    'app assembled'
  );
  return app;
}

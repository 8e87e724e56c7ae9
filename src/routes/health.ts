// src/routes/health.ts
// - GET /             service status
// - GET /health/live  liveness probe

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export const STATUS_PAYLOAD = { status: 'AI Invoice Analyzer running' } as const;

export default async function healthRoutes(app: FastifyInstance) {
  app.get('/', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send(STATUS_PAYLOAD);
  });

  app.get('/health/live', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ alive: true });
  });
}

// src/routes/analyzeInvoice.ts
// POST /analyze-invoice
// Form: file=<pdf | png | jpeg>

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { InvalidInputError } from '../errors.js';
import type { InvoiceAnalyzer, InvoiceUpload } from '../invoice/analyzer.js';
import { createRequestLogger } from '../observability/index.js';

export const UPLOAD_FIELD = 'file';

export function createAnalyzeInvoiceRoutes(analyzer: InvoiceAnalyzer) {
  return async function analyzeInvoiceRoutes(app: FastifyInstance) {
    app.post('/analyze-invoice', async (req: FastifyRequest, reply: FastifyReply) => {
      let upload: InvoiceUpload | undefined;
      for await (const part of req.files()) {
        if (part.fieldname === UPLOAD_FIELD && !upload) {
          // Throws a 413 once the configured fileSize limit is crossed
          const bytes = await part.toBuffer();
          upload = { bytes, contentType: part.mimetype, filename: part.filename };
        } else {
          // unread parts stall the iterator
          part.file.resume();
        }
      }
      if (!upload) {
        throw new InvalidInputError(`No file uploaded (field "${UPLOAD_FIELD}")`);
      }

      const record = await analyzer.analyze(upload, createRequestLogger(req));
      return reply.code(200).send(record);
    });
  };
}

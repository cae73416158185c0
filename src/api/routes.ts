import type { FastifyInstance } from 'fastify';
import { createExtractHandler } from './handlers/extract.handler.js';
import { createHealthHandler } from './handlers/health.handler.js';
import { errorResponseSchema, extractResponseSchema, healthResponseSchema } from './schemas/extract.schema.js';
import type { ExtractionPipeline } from '../services/extraction/ExtractionPipeline.js';
import type { TextProducer } from '../services/llm/TextProducer.interface.js';

export async function registerRoutes(fastify: FastifyInstance, pipeline: ExtractionPipeline, textProducer: TextProducer) {
  fastify.get('/health', {
    schema: {
      response: {
        200: healthResponseSchema,
      },
    },
    handler: createHealthHandler(textProducer),
  });

  fastify.post('/extract', {
    schema: {
      response: {
        200: extractResponseSchema,
        400: errorResponseSchema,
        413: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createExtractHandler(pipeline),
  });
}

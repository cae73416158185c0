import Fastify, { type FastifyServerOptions } from 'fastify';
import multipart from '@fastify/multipart';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { ExtractionPipeline } from '../services/extraction/ExtractionPipeline.js';
import type { TextProducer } from '../services/llm/TextProducer.interface.js';
import { registerRoutes } from './routes.js';
import { sendError } from './handlers/errors.js';

const loggerOptions = (): FastifyServerOptions['logger'] => {
  if (config.server.nodeEnv === 'test') return false;
  if (config.server.nodeEnv === 'development') {
    return { level: config.server.logLevel, transport: { target: 'pino-pretty', options: { destination: 2 } } };
  }
  return { level: config.server.logLevel };
};

export async function buildServer(pipeline: ExtractionPipeline, textProducer: TextProducer) {
  const fastify = Fastify({ logger: loggerOptions() });

  await fastify.register(multipart, {
    limits: {
      fileSize: config.storage.maxUploadSizeMB * 1024 * 1024,
      files: 1,
    },
  });

  await registerRoutes(fastify, pipeline, textProducer);

  fastify.setErrorHandler((error, request, reply) => {
    logger.error({ error, url: request.url }, 'Request error');
    return sendError(reply, error);
  });

  return fastify;
}

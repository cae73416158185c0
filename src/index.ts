import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { PdfPageRenderer } from './services/rendering/PdfPageRenderer.js';
import { TextProducerFactory } from './services/llm/TextProducerFactory.js';
import { ExtractionPipeline } from './services/extraction/ExtractionPipeline.js';
import { buildServer } from './api/server.js';

logger.info('Initializing services...');

const textProducer = TextProducerFactory.createTextProducer();
const pipeline = new ExtractionPipeline(new PdfPageRenderer(), textProducer);

logger.info({ provider: config.llm.provider, model: textProducer.model }, 'Services initialized');

const fastify = await buildServer(pipeline, textProducer);

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

try {
  await fastify.listen({
    port: config.server.port,
    host: '0.0.0.0',
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}

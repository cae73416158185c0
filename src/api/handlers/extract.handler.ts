import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { InvalidInputError } from '../../utils/errors.js';
import type { ExtractionPipeline } from '../../services/extraction/ExtractionPipeline.js';
import { extractQuerySchema } from '../schemas/extract.schema.js';
import { sendError } from './errors.js';

export function createExtractHandler(pipeline: ExtractionPipeline) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const query = extractQuerySchema.safeParse(request.query);
      if (!query.success) {
        throw new InvalidInputError('Invalid extraction parameters', query.error.issues);
      }

      const data = await request.file();
      if (!data) {
        throw new InvalidInputError('No file uploaded');
      }

      const buffer = await data.toBuffer();
      logger.info({ fileName: data.filename, size: buffer.length }, 'Received PDF upload');

      const result = await pipeline.extract(buffer, {
        numSplits: query.data.numSplits,
        overlapRatio: query.data.overlapRatio,
        similarityThreshold: query.data.threshold,
        concurrency: query.data.concurrency,
      });

      return reply.code(200).send({
        documentId: result.documentId,
        fileName: data.filename,
        pageCount: result.pageCount,
        segmentCount: result.segmentCount,
        model: result.model,
        text: result.document.text,
        blocks: result.document.blocks,
        processingTime: result.processingTime,
      });
    } catch (error) {
      logger.error({ error }, 'Extract handler error');
      return sendError(reply, error);
    }
  };
}

import type { FastifyReply } from 'fastify';
import { InvalidInputError, isExtractionError } from '../../utils/errors.js';

const statusCodeOf = (error: unknown): number | undefined =>
  typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number'
    ? error.statusCode
    : undefined;

const codeOf = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

export const sendError = (reply: FastifyReply, error: unknown) => {
  if (error instanceof InvalidInputError) {
    return reply.code(400).send({
      error: error.code,
      message: error.message,
      details: error.details,
    });
  }

  if (isExtractionError(error)) {
    return reply.code(500).send({ error: error.code, message: error.message });
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return reply.code(statusCode).send({
      error: codeOf(error) ?? 'BAD_REQUEST',
      message: error instanceof Error ? error.message : 'Bad request',
    });
  }

  return reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
};

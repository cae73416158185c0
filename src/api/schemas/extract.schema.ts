import { z } from 'zod';

export const extractQuerySchema = z.object({
  numSplits: z.coerce.number().int().min(1).optional(),
  overlapRatio: z.coerce.number().min(0).lt(1).optional(),
  threshold: z.coerce.number().min(0).max(1).optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
});

export type ExtractQuery = z.infer<typeof extractQuerySchema>;

export const extractResponseSchema = {
  type: 'object',
  properties: {
    documentId: { type: 'string' },
    fileName: { type: 'string' },
    pageCount: { type: 'number' },
    segmentCount: { type: 'number' },
    model: { type: 'string' },
    text: { type: 'string' },
    blocks: { type: 'array', items: { type: 'string' } },
    processingTime: { type: 'string' },
  },
  required: ['documentId', 'pageCount', 'segmentCount', 'model', 'text', 'blocks', 'processingTime'],
} as const;

export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
  required: ['error', 'message'],
} as const;

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    timestamp: { type: 'string' },
    environment: { type: 'string' },
    model: { type: 'string' },
    services: {
      type: 'object',
      properties: {
        llm: { type: 'boolean' },
      },
    },
  },
  required: ['status', 'timestamp', 'model'],
} as const;

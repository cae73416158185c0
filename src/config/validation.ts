import { z } from 'zod';

export const llmProviders = ['ollama', 'openai', 'openrouter', 'anthropic'] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  ollama: 'qwen2.5vl:7b',
  openai: 'gpt-4o-mini',
  openrouter: 'qwen/qwen2.5-vl-72b-instruct',
  anthropic: 'claude-3-5-sonnet-latest',
};

export const DEFAULT_BASE_URLS: Partial<Record<LLMProvider, string>> = {
  ollama: 'http://localhost:11434/v1',
  openrouter: 'https://openrouter.ai/api/v1',
};

export const segmentationSchema = z.object({
  numSplits: z.number().int().min(1),
  overlapRatio: z.number().min(0).lt(1),
});

export const similarityThresholdSchema = z.number().min(0).max(1);

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(3000),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  llm: z
    .object({
      provider: z.enum(llmProviders).default('ollama'),
      apiKey: z.string().default(''),
      model: z.string().default(''),
      baseUrl: z.string().url().optional(),
      maxTokens: z.number().int().positive().default(4096),
      temperature: z.number().min(0).max(2).default(0.1),
      topP: z.number().gt(0).max(1).default(0.8),
      timeoutMs: z.number().int().positive().default(120_000),
      maxRetries: z.number().int().min(0).default(2),
      stream: z.boolean().default(false),
    })
    .superRefine((llm, ctx) => {
      if (llm.provider !== 'ollama' && !llm.apiKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['apiKey'],
          message: `API key is required for provider "${llm.provider}"`,
        });
      }
    })
    .transform(llm => ({
      ...llm,
      model: llm.model || DEFAULT_MODELS[llm.provider],
      baseUrl: llm.baseUrl ?? DEFAULT_BASE_URLS[llm.provider],
    })),
  segmentation: z.object({
    numSplits: segmentationSchema.shape.numSplits.default(4),
    overlapRatio: segmentationSchema.shape.overlapRatio.default(0.1),
  }),
  reconciliation: z.object({
    similarityThreshold: similarityThresholdSchema.default(0.7),
  }),
  rendering: z.object({
    scale: z.number().positive().max(8).default(2),
  }),
  transcription: z.object({
    concurrency: z.number().int().positive().default(1),
  }),
  storage: z.object({
    outputDir: z.string().min(1).optional(),
    maxUploadSizeMB: z.number().positive().default(50),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type SegmentationOptions = z.infer<typeof segmentationSchema>;

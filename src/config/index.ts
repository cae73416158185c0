import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

type Env = Record<string, string | undefined>;

const num = (value: string | undefined): number | undefined =>
  value ? Number(value) : undefined;

const bool = (value: string | undefined): boolean | undefined =>
  value ? value === 'true' || value === '1' : undefined;

const apiKeyFor = (provider: string | undefined, env: Env): string => {
  switch (provider) {
    case 'openai':
      return env.OPENAI_API_KEY || '';
    case 'openrouter':
      return env.OPENROUTER_API_KEY || '';
    case 'anthropic':
      return env.ANTHROPIC_API_KEY || '';
    default:
      return env.OLLAMA_API_KEY || '';
  }
};

export function parseConfig(env: Env = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: env.NODE_ENV || undefined,
      port: num(env.PORT),
      logLevel: env.LOG_LEVEL || undefined,
    },
    llm: {
      provider: env.LLM_PROVIDER || undefined,
      apiKey: apiKeyFor(env.LLM_PROVIDER, env),
      model: env.LLM_MODEL || '',
      baseUrl: env.LLM_BASE_URL || undefined,
      maxTokens: num(env.LLM_MAX_TOKENS),
      temperature: num(env.LLM_TEMPERATURE),
      topP: num(env.LLM_TOP_P),
      timeoutMs: num(env.LLM_TIMEOUT_MS),
      maxRetries: num(env.LLM_MAX_RETRIES),
      stream: bool(env.LLM_STREAM),
    },
    segmentation: {
      numSplits: num(env.SEGMENT_NUM_SPLITS),
      overlapRatio: num(env.SEGMENT_OVERLAP_RATIO),
    },
    reconciliation: {
      similarityThreshold: num(env.RECONCILE_SIMILARITY_THRESHOLD),
    },
    rendering: {
      scale: num(env.RENDER_SCALE),
    },
    transcription: {
      concurrency: num(env.TRANSCRIBE_CONCURRENCY),
    },
    storage: {
      outputDir: env.OUTPUT_DIR || undefined,
      maxUploadSizeMB: num(env.MAX_UPLOAD_SIZE_MB),
    },
  };

  return configSchema.parse(rawConfig);
}

function loadConfig(): Config {
  try {
    return parseConfig();
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();

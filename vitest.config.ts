import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      LLM_PROVIDER: 'ollama',
      LLM_MODEL: '',
      LLM_STREAM: 'false',
      SEGMENT_NUM_SPLITS: '4',
      SEGMENT_OVERLAP_RATIO: '0.1',
      RECONCILE_SIMILARITY_THRESHOLD: '0.7',
      TRANSCRIBE_CONCURRENCY: '1',
      OUTPUT_DIR: '',
    },
  },
});

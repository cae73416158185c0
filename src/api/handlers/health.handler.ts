import { config } from '../../config/index.js';
import type { TextProducer } from '../../services/llm/TextProducer.interface.js';

export function createHealthHandler(textProducer: TextProducer) {
  return async () => {
    const llmOk = await textProducer.testConnection();

    return {
      status: llmOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      model: textProducer.model,
      services: {
        llm: llmOk,
      },
    };
  };
}

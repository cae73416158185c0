import OpenAI from 'openai';
import { config } from '../../config/index.js';

type OpenAIClientOptions = NonNullable<ConstructorParameters<typeof OpenAI>[0]>;

export class OpenAIClientFactory {
  private static instance: OpenAI | null = null;

  static getClient(): OpenAI {
    if (this.instance) {
      return this.instance;
    }

    const clientConfig: OpenAIClientOptions = {
      // ollama ignores the key but the client insists on one
      apiKey: config.llm.apiKey || 'ollama',
      timeout: config.llm.timeoutMs,
      maxRetries: config.llm.maxRetries,
    };

    if (config.llm.baseUrl) {
      clientConfig.baseURL = config.llm.baseUrl;
    }

    this.instance = new OpenAI(clientConfig);
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}

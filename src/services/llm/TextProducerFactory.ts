import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { TextProducer } from './TextProducer.interface.js';
import { OpenAITextProducer, type TextProducerSettings } from './OpenAITextProducer.js';
import { AnthropicTextProducer } from './AnthropicTextProducer.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export class TextProducerFactory {
  private static instance: TextProducer | null = null;

  static createTextProducer(overrides: Partial<TextProducerSettings> = {}): TextProducer {
    const cacheable = Object.keys(overrides).length === 0;
    if (cacheable && this.instance) {
      return this.instance;
    }

    const settings: TextProducerSettings = {
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
      topP: config.llm.topP,
      stream: config.llm.stream,
      ...overrides,
    };

    let producer: TextProducer;
    switch (config.llm.provider) {
      case 'ollama':
      case 'openai':
      case 'openrouter':
        logger.info({ provider: config.llm.provider, model: settings.model }, 'Initializing OpenAI-compatible text producer');
        producer = new OpenAITextProducer(OpenAIClientFactory.getClient(), settings);
        break;
      case 'anthropic':
        logger.info({ model: settings.model }, 'Initializing Anthropic text producer');
        producer = new AnthropicTextProducer(
          new Anthropic({
            apiKey: config.llm.apiKey,
            baseURL: config.llm.baseUrl,
            timeout: config.llm.timeoutMs,
            maxRetries: config.llm.maxRetries,
          }),
          settings
        );
        break;
      default:
        throw new Error(`Unsupported LLM provider: ${String(config.llm.provider)}`);
    }

    if (cacheable) {
      this.instance = producer;
    }
    return producer;
  }

  static reset(): void {
    this.instance = null;
  }
}

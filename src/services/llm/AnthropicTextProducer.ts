import type Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger.js';
import { TranscriptionError } from '../../utils/errors.js';
import { segmentLabel } from '../../domain/entities/index.js';
import type { TextProducer, TranscriptionRequest, TranscriptionResponse } from './TextProducer.interface.js';
import type { TextProducerSettings } from './OpenAITextProducer.js';
import { TRANSCRIPTION_PROMPT } from './prompts/transcription.js';

const textOf = (message: Anthropic.Message): string =>
  message.content
    .map(block => (block.type === 'text' ? block.text : ''))
    .join('')
    .trim();

export class AnthropicTextProducer implements TextProducer {
  constructor(
    private client: Anthropic,
    private settings: TextProducerSettings
  ) {}

  get model(): string {
    return this.settings.model;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.settings.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionResponse> {
    const { segment } = request;
    try {
      logger.debug(
        { segment: segmentLabel(segment), imageBytes: request.image.length, model: this.settings.model },
        'Sending transcription request to Anthropic'
      );

      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        top_p: this.settings.topP,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image',
                source: { type: 'base64', media_type: 'image/png', data: request.image.toString('base64') },
              },
              { type: 'text', text: TRANSCRIPTION_PROMPT },
            ],
          },
        ],
      };

      let message: Anthropic.Message;
      if (this.settings.stream) {
        const stream = this.client.messages.stream(params);
        stream.on('text', delta => request.onDelta?.(delta));
        message = await stream.finalMessage();
      } else {
        message = await this.client.messages.create(params);
      }

      const text = textOf(message);
      if (!this.settings.stream) {
        request.onDelta?.(text);
      }

      return {
        text,
        model: message.model,
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      };
    } catch (error) {
      logger.error({ error, segment: segmentLabel(segment) }, 'Anthropic transcription failed');
      if (error instanceof TranscriptionError) {
        throw error;
      }
      throw new TranscriptionError(`Transcription of ${segmentLabel(segment)} failed`, error);
    }
  }
}

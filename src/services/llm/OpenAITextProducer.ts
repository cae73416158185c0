import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { Config } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { TranscriptionError } from '../../utils/errors.js';
import { segmentLabel } from '../../domain/entities/index.js';
import type { TextProducer, TranscriptionRequest, TranscriptionResponse } from './TextProducer.interface.js';
import { TRANSCRIPTION_PROMPT, toDataUrl } from './prompts/transcription.js';

export type TextProducerSettings = Pick<Config['llm'], 'model' | 'maxTokens' | 'temperature' | 'topP' | 'stream'>;

/**
 * Vision transcription over the chat completions API. Serves OpenAI itself
 * and the compatible endpoints of OpenRouter and Ollama.
 */
export class OpenAITextProducer implements TextProducer {
  constructor(
    private client: OpenAI,
    private settings: TextProducerSettings
  ) {}

  get model(): string {
    return this.settings.model;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
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
        'Sending transcription request'
      );

      const messages: ChatCompletionMessageParam[] = [
        {
          role: 'user',
          content: [
            { type: 'text', text: TRANSCRIPTION_PROMPT },
            { type: 'image_url', image_url: { url: toDataUrl(request.image) } },
          ],
        },
      ];

      const params = {
        model: this.settings.model,
        messages,
        temperature: this.settings.temperature,
        top_p: this.settings.topP,
        max_tokens: this.settings.maxTokens,
      };

      if (this.settings.stream) {
        const stream = await this.client.chat.completions.create({ ...params, stream: true });
        let text = '';
        let model = this.settings.model;
        for await (const chunk of stream) {
          model = chunk.model || model;
          const delta = chunk.choices[0]?.delta?.content;
          if (delta) {
            text += delta;
            request.onDelta?.(delta);
          }
        }
        return { text: text.trim(), model };
      }

      const completion = await this.client.chat.completions.create(params);
      const choice = completion.choices[0];
      if (!choice) {
        throw new TranscriptionError('No choices in completion response');
      }

      const text = (choice.message.content ?? '').trim();
      request.onDelta?.(text);

      return {
        text,
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens,
      };
    } catch (error) {
      logger.error({ error, segment: segmentLabel(segment) }, 'Transcription failed');
      if (error instanceof TranscriptionError) {
        throw error;
      }
      throw new TranscriptionError(`Transcription of ${segmentLabel(segment)} failed`, error);
    }
  }
}

import OpenAI from 'openai';
import { describe, expect, it, vi } from 'vitest';
import { OpenAITextProducer, type TextProducerSettings } from './OpenAITextProducer.js';
import { TranscriptionError } from '../../utils/errors.js';
import type { Segment } from '../../domain/entities/index.js';

const segment: Segment = { pageIndex: 0, splitIndex: 1, yStart: 225, yEnd: 525, width: 800 };
const image = Buffer.from('fake-png');

const settings: TextProducerSettings = {
  model: 'qwen2.5vl:7b',
  maxTokens: 1024,
  temperature: 0.1,
  topP: 0.8,
  stream: false,
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const completion = (content: string | null) => ({
  id: 'chatcmpl-1',
  object: 'chat.completion',
  created: 0,
  model: 'qwen2.5vl:7b',
  choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop', logprobs: null }],
  usage: { prompt_tokens: 40, completion_tokens: 8, total_tokens: 48 },
});

const clientWith = (fetch: ReturnType<typeof vi.fn>) =>
  new OpenAI({ apiKey: 'test-key', baseURL: 'http://model.test/v1', maxRetries: 0, fetch });

describe('OpenAITextProducer', () => {
  it('sends the page image with the transcription prompt and trims the answer', async () => {
    const fetch = vi.fn().mockResolvedValue(jsonResponse(completion('  Invoice 2041\nTotal due  \n')));
    const producer = new OpenAITextProducer(clientWith(fetch), settings);

    const result = await producer.transcribe({ image, segment });

    expect(result).toEqual({ text: 'Invoice 2041\nTotal due', model: 'qwen2.5vl:7b', tokensUsed: 48 });

    const [url, init] = fetch.mock.calls[0];
    expect(String(url)).toBe('http://model.test/v1/chat/completions');
    const body = JSON.parse(String(init.body));
    expect(body.model).toBe('qwen2.5vl:7b');
    expect(body.temperature).toBe(0.1);
    expect(body.top_p).toBe(0.8);
    expect(body.messages[0].content[1]).toEqual({
      type: 'image_url',
      image_url: { url: `data:image/png;base64,${image.toString('base64')}` },
    });
  });

  it('accepts an empty transcription for a blank strip', async () => {
    const fetch = vi.fn().mockResolvedValue(jsonResponse(completion(null)));
    const producer = new OpenAITextProducer(clientWith(fetch), settings);

    expect((await producer.transcribe({ image, segment })).text).toBe('');
  });

  it('collects streamed deltas', async () => {
    const chunk = (content: string) =>
      `data: ${JSON.stringify({
        id: 'chatcmpl-1',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'qwen2.5vl:7b',
        choices: [{ index: 0, delta: { content }, finish_reason: null }],
      })}\n\n`;
    const sse = chunk('Hello ') + chunk('world\n') + 'data: [DONE]\n\n';
    const fetch = vi
      .fn()
      .mockResolvedValue(new Response(sse, { status: 200, headers: { 'content-type': 'text/event-stream' } }));
    const producer = new OpenAITextProducer(clientWith(fetch), { ...settings, stream: true });
    const deltas: string[] = [];

    const result = await producer.transcribe({ image, segment, onDelta: text => deltas.push(text) });

    expect(deltas).toEqual(['Hello ', 'world\n']);
    expect(result.text).toBe('Hello world');
  });

  it('wraps API failures in TranscriptionError', async () => {
    const fetch = vi.fn().mockResolvedValue(jsonResponse({ error: { message: 'model not found' } }, 404));
    const producer = new OpenAITextProducer(clientWith(fetch), settings);

    await expect(producer.transcribe({ image, segment })).rejects.toThrow(TranscriptionError);
    await expect(producer.transcribe({ image, segment })).rejects.toThrow('Transcription of page 1, part 2 failed');
  });

  it('rejects a response without choices', async () => {
    const fetch = vi.fn().mockResolvedValue(jsonResponse({ ...completion('x'), choices: [] }));
    const producer = new OpenAITextProducer(clientWith(fetch), settings);

    await expect(producer.transcribe({ image, segment })).rejects.toThrow('No choices in completion response');
  });
});

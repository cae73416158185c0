import { describe, expect, it } from 'vitest';
import { ExtractionPipeline, type ExtractionProgress } from './ExtractionPipeline.js';
import { BlankPageRenderer, ScriptedTextProducer } from '../../testing/fakes.js';
import { InvalidInputError, TranscriptionError } from '../../utils/errors.js';

const memo: Record<string, string> = {
  '0:0': 'Title of the memo\nFirst paragraph line\nShared boundary line',
  '0:1': 'Shared boundary line\nSecond paragraph continues here with several more words',
  '1:0': 'Page two heading\nA table row with numbers 12 and 40',
  '1:1': 'A table row with numbers 12 and 40\nFinal remarks close the memo politely',
};

const source = Buffer.from('%PDF-1.7 placeholder');

describe('ExtractionPipeline', () => {
  it('segments every page, transcribes each strip and removes the overlaps', async () => {
    const producer = new ScriptedTextProducer(memo);
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100, 100]), producer);

    const result = await pipeline.extract(source, { numSplits: 2, overlapRatio: 0.1, concurrency: 1 });

    expect(result.pageCount).toBe(2);
    expect(result.segmentCount).toBe(4);
    expect(result.model).toBe('scripted-vision');
    expect(result.documentId).toMatch(/^doc-/);
    expect(result.document.text).toBe(
      'Title of the memo\nFirst paragraph line\nShared boundary line\n\n' +
        'Second paragraph continues here with several more words\n\n' +
        'Page two heading\nA table row with numbers 12 and 40\n\n' +
        'Final remarks close the memo politely'
    );
    expect(result.units.map(unit => unit.text)).toEqual(Object.values(memo));
  });

  it('sends cropped strips including the overlap band', async () => {
    const producer = new ScriptedTextProducer(memo);
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100]), producer);

    await pipeline.extract(source, { numSplits: 2, overlapRatio: 0.1 });

    expect(producer.calls.map(call => [call.segment.yStart, call.segment.yEnd, call.imageHeight])).toEqual([
      [0, 55, 55],
      [45, 100, 55],
    ]);
  });

  it('sends whole pages when splitting is off', async () => {
    const producer = new ScriptedTextProducer({ '0:0': 'Only page' });
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([80]), producer);

    const result = await pipeline.extract(source, { numSplits: 1 });

    expect(producer.calls).toHaveLength(1);
    expect(producer.calls[0].imageHeight).toBe(80);
    expect(result.document.text).toBe('Only page');
  });

  it('keeps segment order when later strips finish first', async () => {
    const producer = new ScriptedTextProducer(memo, segment => (3 - segment.pageIndex * 2 - segment.splitIndex) * 15);
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100, 100]), producer);

    const result = await pipeline.extract(source, { numSplits: 2, overlapRatio: 0.1, concurrency: 3 });

    expect(producer.maxInFlight).toBe(3);
    expect(result.units.map(unit => [unit.segment.pageIndex, unit.segment.splitIndex])).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
    expect(result.document.text).toContain('Second paragraph continues here with several more words\n\nPage two heading');
  });

  it('reports progress for rendering, transcription and reconciliation', async () => {
    const events: ExtractionProgress[] = [];
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100]), new ScriptedTextProducer(memo));

    await pipeline.extract(source, { numSplits: 2, onProgress: progress => events.push(progress) });

    expect(events.map(event => `${event.phase} ${event.current}/${event.total}`)).toEqual([
      'rendering 1/1',
      'transcribing 1/2',
      'transcribing 2/2',
      'reconciling 0/2',
    ]);
  });

  it('forwards streamed text with its segment', async () => {
    const seen: string[] = [];
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100]), new ScriptedTextProducer(memo));

    await pipeline.extract(source, {
      numSplits: 2,
      onDelta: (segment, text) => seen.push(`${segment.splitIndex}:${text.split('\n')[0]}`),
    });

    expect(seen).toEqual(['0:Title of the memo', '1:Shared boundary line']);
  });

  it('aborts the document when a strip fails', async () => {
    const producer = new ScriptedTextProducer({
      ...memo,
      '0:1': new TranscriptionError('Transcription of page 1, part 2 failed'),
    });
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100, 100]), producer);

    await expect(pipeline.extract(source, { numSplits: 2, concurrency: 1 })).rejects.toThrow(
      'Transcription of page 1, part 2 failed'
    );
    expect(producer.calls).toHaveLength(2);
  });

  it('rejects invalid options before transcribing', async () => {
    const producer = new ScriptedTextProducer(memo);
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([100]), producer);

    await expect(pipeline.extract(source, { overlapRatio: 1 })).rejects.toThrow(InvalidInputError);
    await expect(pipeline.extract(source, { similarityThreshold: 2 })).rejects.toThrow(InvalidInputError);
    await expect(pipeline.extract(source, { concurrency: 0 })).rejects.toThrow(InvalidInputError);
    await expect(pipeline.extract(source, { numSplits: 2.5 })).rejects.toThrow(InvalidInputError);
    await expect(pipeline.extract(source, { numSplits: Number('4abc') })).rejects.toThrow(InvalidInputError);
    expect(producer.calls).toHaveLength(0);
  });

  it('returns an empty document for a PDF without pages', async () => {
    const pipeline = new ExtractionPipeline(new BlankPageRenderer([]), new ScriptedTextProducer({}));

    const result = await pipeline.extract(source);

    expect(result.pageCount).toBe(0);
    expect(result.document).toEqual({ blocks: [], text: '' });
  });
});

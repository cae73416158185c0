import { describe, expect, it } from 'vitest';
import { Segmenter } from './Segmenter.js';
import { InvalidInputError } from '../../utils/errors.js';

const page = (height: number, width = 800, index = 0) => ({ index, width, height });

describe('Segmenter', () => {
  const segmenter = new Segmenter();

  it('returns the whole page as one segment when numSplits is 1', () => {
    expect(segmenter.segment(page(1131, 800, 3), 1, 0.5)).toEqual([
      { pageIndex: 3, splitIndex: 0, yStart: 0, yEnd: 1131, width: 800 },
    ]);
  });

  it('overlaps inner boundaries by floor(baseHeight * overlapRatio)', () => {
    const bounds = segmenter.segment(page(1000), 4, 0.1).map(s => [s.yStart, s.yEnd]);
    expect(bounds).toEqual([
      [0, 275],
      [225, 525],
      [475, 775],
      [725, 1000],
    ]);
  });

  it('extends the last segment over the division remainder', () => {
    const segments = segmenter.segment(page(1003), 4, 0.1);
    expect(segments[3]).toMatchObject({ yStart: 725, yEnd: 1003 });
    expect(segments[2]).toMatchObject({ yStart: 475, yEnd: 775 });
  });

  it('produces abutting segments when overlapRatio is 0', () => {
    const bounds = segmenter.segment(page(10), 3, 0).map(s => [s.yStart, s.yEnd]);
    expect(bounds).toEqual([
      [0, 3],
      [3, 6],
      [6, 10],
    ]);
  });

  it('keeps the full width and numbers splits in order', () => {
    const segments = segmenter.segment(page(600, 420, 2), 3, 0.2);
    expect(segments.map(s => s.splitIndex)).toEqual([0, 1, 2]);
    expect(segments.every(s => s.width === 420 && s.pageIndex === 2)).toBe(true);
  });

  it('covers every page height without gaps and in increasing order', () => {
    for (const height of [1, 2, 7, 99, 100, 101, 1683]) {
      for (const numSplits of [1, 2, 3, 4, 7]) {
        if (height < numSplits) continue;
        for (const overlapRatio of [0, 0.1, 0.5, 0.99]) {
          const segments = segmenter.segment(page(height), numSplits, overlapRatio);

          expect(segments).toHaveLength(numSplits);
          expect(segments[0].yStart).toBe(0);
          expect(segments[segments.length - 1].yEnd).toBe(height);
          for (let i = 0; i < segments.length; i++) {
            expect(segments[i].yEnd).toBeGreaterThan(segments[i].yStart);
            if (i > 0) {
              expect(segments[i].yStart).toBeGreaterThan(segments[i - 1].yStart);
              expect(segments[i].yStart).toBeLessThanOrEqual(segments[i - 1].yEnd);
            }
          }
        }
      }
    }
  });

  it('clamps the split count to the page height', () => {
    const bounds = segmenter.segment(page(3), 5, 0.1).map(s => [s.yStart, s.yEnd]);
    expect(bounds).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
    ]);
  });

  it.each([
    ['an empty page', page(0), 4, 0.1],
    ['a fractional height', page(10.5), 2, 0.1],
    ['zero splits', page(100), 0, 0.1],
    ['a fractional split count', page(100), 1.5, 0.1],
    ['an overlap ratio of 1', page(100), 2, 1],
    ['a negative overlap ratio', page(100), 2, -0.1],
  ])('rejects %s', (_label, input, numSplits, overlapRatio) => {
    expect(() => segmenter.segment(input, numSplits, overlapRatio)).toThrow(InvalidInputError);
  });
});

import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { InvalidInputError } from '../../utils/errors.js';
import { segmentationSchema } from '../../config/validation.js';
import type { PageDimensions, Segment } from '../../domain/entities/index.js';

const pageSchema = z.object({
  index: z.number().int().min(0),
  width: z.number().int().min(1),
  height: z.number().int().min(1),
});

/**
 * Splits a page into `numSplits` horizontal strips top to bottom. Each strip
 * except the first reaches `overlap` pixels above its base band and each strip
 * except the last reaches `overlap` pixels below it, so a text line cut at one
 * boundary is whole in at least one neighbour.
 */
export class Segmenter {
  segment(page: PageDimensions, numSplits: number, overlapRatio: number): Segment[] {
    const pageCheck = pageSchema.safeParse(page);
    if (!pageCheck.success) {
      throw new InvalidInputError('Page must have integer dimensions of at least 1px', pageCheck.error.issues);
    }
    const optionsCheck = segmentationSchema.safeParse({ numSplits, overlapRatio });
    if (!optionsCheck.success) {
      throw new InvalidInputError(
        'numSplits must be a positive integer and overlapRatio must be in [0, 1)',
        optionsCheck.error.issues
      );
    }

    if (numSplits <= 1) {
      return [{ pageIndex: page.index, splitIndex: 0, yStart: 0, yEnd: page.height, width: page.width }];
    }

    const splits = Math.min(numSplits, page.height);
    if (splits < numSplits) {
      logger.warn(
        { pageIndex: page.index, height: page.height, requested: numSplits, splits },
        'Page shorter than split count, clamping'
      );
    }

    const baseHeight = Math.floor(page.height / splits);
    const overlap = Math.floor(baseHeight * overlapRatio);
    const segments: Segment[] = [];

    for (let i = 0; i < splits; i++) {
      const yStart = Math.max(0, i * baseHeight - (i > 0 ? overlap : 0));
      const yEnd =
        i === splits - 1
          ? page.height
          : Math.min((i + 1) * baseHeight + overlap, page.height);

      segments.push({ pageIndex: page.index, splitIndex: i, yStart, yEnd, width: page.width });
    }

    logger.debug({ pageIndex: page.index, splits, baseHeight, overlap }, 'Segmented page');

    return segments;
  }
}

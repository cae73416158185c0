import sharp from 'sharp';
import { logger } from '../../utils/logger.js';
import { RenderError } from '../../utils/errors.js';
import { segmentHeight, type Page, type Segment } from '../../domain/entities/index.js';

export class ImageCropper {
  async crop(page: Page, segment: Segment): Promise<Buffer> {
    if (segment.yStart === 0 && segment.yEnd === page.height) {
      return page.image;
    }

    try {
      const cropped = await sharp(page.image)
        .extract({ left: 0, top: segment.yStart, width: page.width, height: segmentHeight(segment) })
        .png()
        .toBuffer();

      logger.debug(
        { pageIndex: page.index, splitIndex: segment.splitIndex, yStart: segment.yStart, yEnd: segment.yEnd },
        'Cropped segment'
      );

      return cropped;
    } catch (error) {
      logger.error({ error, pageIndex: page.index, splitIndex: segment.splitIndex }, 'Segment crop failed');
      throw new RenderError('Failed to crop page segment', error);
    }
  }
}

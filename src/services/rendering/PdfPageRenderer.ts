import { readFile } from 'fs/promises';
import * as mupdf from 'mupdf';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { InvalidInputError, RenderError } from '../../utils/errors.js';
import type { Page } from '../../domain/entities/index.js';
import type { PageRenderer, PdfSource } from './PageRenderer.interface.js';

const PDF_MIME_TYPE = 'application/pdf';

export class PdfPageRenderer implements PageRenderer {
  constructor(private scale: number = config.rendering.scale) {}

  async countPages(source: PdfSource): Promise<number> {
    const document = await this.open(source);
    try {
      return document.countPages();
    } catch (error) {
      throw new RenderError('Failed to read PDF page tree', error);
    } finally {
      document.destroy();
    }
  }

  async render(source: PdfSource, pageIndex: number): Promise<Page> {
    const document = await this.open(source);
    try {
      const pageCount = document.countPages();
      if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageCount) {
        throw new InvalidInputError(`Page index ${pageIndex} out of range`, { pageCount });
      }
      return this.rasterize(document, pageIndex);
    } finally {
      document.destroy();
    }
  }

  async *renderAll(source: PdfSource): AsyncGenerator<Page> {
    const document = await this.open(source);
    try {
      const pageCount = document.countPages();
      logger.debug({ pageCount, scale: this.scale }, 'Rendering PDF');
      for (let index = 0; index < pageCount; index++) {
        yield this.rasterize(document, index);
      }
    } finally {
      document.destroy();
    }
  }

  private async open(source: PdfSource): Promise<mupdf.Document> {
    try {
      const data = typeof source === 'string' ? await readFile(source) : source;
      return mupdf.Document.openDocument(data, PDF_MIME_TYPE);
    } catch (error) {
      logger.error({ error, source: typeof source === 'string' ? source : '<buffer>' }, 'Failed to open PDF');
      throw new RenderError('Failed to open PDF', error);
    }
  }

  private rasterize(document: mupdf.Document, index: number): Page {
    let page: mupdf.Page | undefined;
    let pixmap: mupdf.Pixmap | undefined;
    try {
      page = document.loadPage(index);
      pixmap = page.toPixmap(mupdf.Matrix.scale(this.scale, this.scale), mupdf.ColorSpace.DeviceRGB, false, true);
      const rendered: Page = {
        index,
        width: pixmap.getWidth(),
        height: pixmap.getHeight(),
        image: Buffer.from(pixmap.asPNG()),
      };

      logger.debug({ pageIndex: index, width: rendered.width, height: rendered.height }, 'Rendered page');

      return rendered;
    } catch (error) {
      logger.error({ error, pageIndex: index }, 'Page rendering failed');
      throw new RenderError(`Failed to render page ${index + 1}`, error);
    } finally {
      pixmap?.destroy();
      page?.destroy();
    }
  }
}

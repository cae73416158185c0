import type { Page } from '../../domain/entities/index.js';

/** A PDF given as a file path or as its bytes. */
export type PdfSource = string | Buffer;

export interface PageRenderer {
  countPages(source: PdfSource): Promise<number>;
  render(source: PdfSource, pageIndex: number): Promise<Page>;
  renderAll(source: PdfSource): AsyncIterable<Page>;
}

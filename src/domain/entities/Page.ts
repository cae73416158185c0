/**
 * A single rendered page raster. `image` holds PNG bytes; dimensions are in
 * pixels at the render scale.
 */
export interface Page {
  readonly index: number;
  readonly width: number;
  readonly height: number;
  readonly image: Buffer;
}

export type PageDimensions = Pick<Page, 'index' | 'width' | 'height'>;

/**
 * Vertical strip of a page, `[yStart, yEnd)` over the full page width.
 * Neighbouring segments of the same page overlap by a fixed pixel band.
 */
export interface Segment {
  readonly pageIndex: number;
  readonly splitIndex: number;
  readonly yStart: number;
  readonly yEnd: number;
  readonly width: number;
}

export const segmentHeight = (segment: Segment): number => segment.yEnd - segment.yStart;

export const segmentLabel = (segment: Segment): string =>
  `page ${segment.pageIndex + 1}, part ${segment.splitIndex + 1}`;

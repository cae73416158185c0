import type { Segment } from './Segment.js';

/** Raw model output for one segment, before overlap removal. */
export interface TranscriptionUnit {
  segment: Segment;
  text: string;
  model: string;
  tokensUsed?: number;
}

export interface ReconciledDocument {
  /** One entry per unit; the first is verbatim, later ones may lose a leading portion. */
  blocks: string[];
  text: string;
}

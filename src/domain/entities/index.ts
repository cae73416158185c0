export type { Page, PageDimensions } from './Page.js';
export { segmentHeight, segmentLabel, type Segment } from './Segment.js';
export type { TranscriptionUnit, ReconciledDocument } from './Transcription.js';

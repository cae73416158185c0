import type { Segment } from '../../domain/entities/index.js';

export interface TranscriptionRequest {
  /** PNG bytes of the segment. */
  image: Buffer;
  segment: Segment;
  /** Receives text as the model produces it, when streaming is enabled. */
  onDelta?: (text: string) => void;
}

export interface TranscriptionResponse {
  text: string;
  model: string;
  tokensUsed?: number;
}

export interface TextProducer {
  readonly model: string;
  transcribe(request: TranscriptionRequest): Promise<TranscriptionResponse>;
  testConnection(): Promise<boolean>;
}

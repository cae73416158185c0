export class InvalidInputError extends Error {
  code = 'INVALID_INPUT';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class RenderError extends Error {
  code = 'RENDER_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'RenderError';
  }
}

export class TranscriptionError extends Error {
  code = 'TRANSCRIPTION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'TranscriptionError';
  }
}

export class DocumentStorageError extends Error {
  code = 'DOCUMENT_STORAGE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocumentStorageError';
  }
}

export type ExtractionErrorLike = InvalidInputError | RenderError | TranscriptionError | DocumentStorageError;

export const isExtractionError = (error: unknown): error is ExtractionErrorLike =>
  error instanceof InvalidInputError ||
  error instanceof RenderError ||
  error instanceof TranscriptionError ||
  error instanceof DocumentStorageError;

import { config } from '../../config/index.js';
import { segmentationSchema } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { InvalidInputError } from '../../utils/errors.js';
import { generateId } from '../../utils/uuid.js';
import {
  segmentLabel,
  type ReconciledDocument,
  type Segment,
  type TranscriptionUnit,
} from '../../domain/entities/index.js';
import type { PageRenderer, PdfSource } from '../rendering/PageRenderer.interface.js';
import type { TextProducer } from '../llm/TextProducer.interface.js';
import { Segmenter } from '../segmentation/Segmenter.js';
import { ImageCropper } from '../segmentation/ImageCropper.js';
import { Reconciler } from '../reconciliation/Reconciler.js';
import { mapBounded } from './TranscriptionPool.js';

export interface ExtractionProgress {
  phase: 'rendering' | 'transcribing' | 'reconciling';
  current: number;
  total: number;
  label?: string;
}

export interface ExtractionOptions {
  numSplits: number;
  overlapRatio: number;
  similarityThreshold: number;
  concurrency: number;
  onProgress?: (progress: ExtractionProgress) => void;
  onDelta?: (segment: Segment, text: string) => void;
}

export interface ExtractionResult {
  documentId: string;
  pageCount: number;
  segmentCount: number;
  model: string;
  units: TranscriptionUnit[];
  document: ReconciledDocument;
  processingTime: string;
}

interface SegmentJob {
  segment: Segment;
  image: Buffer;
}

export class ExtractionPipeline {
  private segmenter = new Segmenter();
  private cropper = new ImageCropper();

  constructor(
    private renderer: PageRenderer,
    private textProducer: TextProducer
  ) {}

  get model(): string {
    return this.textProducer.model;
  }

  async extract(source: PdfSource, overrides: Partial<ExtractionOptions> = {}): Promise<ExtractionResult> {
    const startTime = Date.now();
    const documentId = generateId('doc');
    const options: ExtractionOptions = {
      numSplits: overrides.numSplits ?? config.segmentation.numSplits,
      overlapRatio: overrides.overlapRatio ?? config.segmentation.overlapRatio,
      similarityThreshold: overrides.similarityThreshold ?? config.reconciliation.similarityThreshold,
      concurrency: overrides.concurrency ?? config.transcription.concurrency,
      onProgress: overrides.onProgress,
      onDelta: overrides.onDelta,
    };

    const segmentation = segmentationSchema.safeParse(options);
    if (!segmentation.success) {
      throw new InvalidInputError('Invalid segmentation options', segmentation.error.issues);
    }
    const reconciler = new Reconciler(options.similarityThreshold);

    logger.info(
      {
        documentId,
        numSplits: options.numSplits,
        overlapRatio: options.overlapRatio,
        concurrency: options.concurrency,
        model: this.textProducer.model,
      },
      'Starting extraction'
    );

    const { jobs, pageCount } = await this.prepareSegments(source, options);

    let completed = 0;
    const units = await mapBounded(jobs, options.concurrency, async (job): Promise<TranscriptionUnit> => {
      const response = await this.textProducer.transcribe({
        image: job.image,
        segment: job.segment,
        onDelta: options.onDelta ? text => options.onDelta?.(job.segment, text) : undefined,
      });

      completed++;
      options.onProgress?.({
        phase: 'transcribing',
        current: completed,
        total: jobs.length,
        label: segmentLabel(job.segment),
      });
      logger.debug({ documentId, segment: segmentLabel(job.segment), chars: response.text.length }, 'Segment transcribed');

      return { segment: job.segment, ...response };
    });

    options.onProgress?.({ phase: 'reconciling', current: 0, total: units.length });
    const document = reconciler.reconcileDocument(units.map(unit => unit.text));

    const processingTime = `${Date.now() - startTime}ms`;
    logger.info(
      { documentId, pageCount, segmentCount: jobs.length, chars: document.text.length, processingTime },
      'Extraction complete'
    );

    return {
      documentId,
      pageCount,
      segmentCount: jobs.length,
      model: this.textProducer.model,
      units,
      document,
      processingTime,
    };
  }

  private async prepareSegments(
    source: PdfSource,
    options: ExtractionOptions
  ): Promise<{ jobs: SegmentJob[]; pageCount: number }> {
    const jobs: SegmentJob[] = [];
    const totalPages = await this.renderer.countPages(source);
    let pageCount = 0;

    for await (const page of this.renderer.renderAll(source)) {
      pageCount++;
      options.onProgress?.({ phase: 'rendering', current: pageCount, total: totalPages, label: `page ${page.index + 1}` });

      for (const segment of this.segmenter.segment(page, options.numSplits, options.overlapRatio)) {
        jobs.push({ segment, image: await this.cropper.crop(page, segment) });
      }
    }

    return { jobs, pageCount };
  }
}

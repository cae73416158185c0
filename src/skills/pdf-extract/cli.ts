#!/usr/bin/env node
import { access } from 'fs/promises';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { segmentLabel, type Segment } from '../../domain/entities/index.js';
import { PdfPageRenderer } from '../../services/rendering/PdfPageRenderer.js';
import { TextProducerFactory } from '../../services/llm/TextProducerFactory.js';
import type { TextProducerSettings } from '../../services/llm/OpenAITextProducer.js';
import { ExtractionPipeline, type ExtractionOptions } from '../../services/extraction/ExtractionPipeline.js';
import { FileSystemStorage } from '../../services/storage/FileSystemStorage.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import { HELP, parseArgs, type CliArgs } from './args.js';

const producerOverrides = (args: CliArgs): Partial<TextProducerSettings> => {
  const overrides: Partial<TextProducerSettings> = {};
  if (args.model) overrides.model = args.model;
  if (args.stream !== undefined) overrides.stream = args.stream;
  return overrides;
};

const extractionOverrides = (args: CliArgs): Partial<ExtractionOptions> => {
  const overrides: Partial<ExtractionOptions> = {};
  if (args.numSplits !== undefined) overrides.numSplits = args.numSplits;
  if (args.overlapRatio !== undefined) overrides.overlapRatio = args.overlapRatio;
  if (args.threshold !== undefined) overrides.similarityThreshold = args.threshold;
  if (args.concurrency !== undefined) overrides.concurrency = args.concurrency;
  return overrides;
};

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (!args.pdfPath) {
    console.error('Error: a PDF path is required');
    console.log(HELP);
    process.exit(1);
  }

  if (args.unknown.length > 0) {
    console.error(`Error: unrecognised arguments: ${args.unknown.join(' ')}`);
    process.exit(1);
  }

  const pdfPath = args.pdfPath;
  try {
    await access(pdfPath);
  } catch {
    console.error(`Error: file not found: ${pdfPath}`);
    process.exit(1);
  }

  const textProducer = TextProducerFactory.createTextProducer(producerOverrides(args));
  const pipeline = new ExtractionPipeline(new PdfPageRenderer(), textProducer);
  const storage = new FileSystemStorage(args.outputDir ?? config.storage.outputDir);

  const options = extractionOverrides(args);
  const streaming = (args.stream ?? config.llm.stream) && (options.concurrency ?? config.transcription.concurrency) === 1;
  const echo = streaming && args.format === 'text';
  const reporter = new ProgressReporter(!echo && args.format !== 'json');

  let current: Segment | undefined;
  const onDelta = (segment: Segment, text: string): void => {
    if (current !== segment) {
      current = segment;
      process.stdout.write(`\n\n--- ${segmentLabel(segment)} ---\n`);
    }
    process.stdout.write(text);
  };

  try {
    logger.info({ pdfPath, model: pipeline.model }, 'Starting PDF extraction');

    const result = await pipeline.extract(pdfPath, {
      ...options,
      onProgress: progress => reporter.update(progress),
      onDelta: echo ? onDelta : undefined,
    });
    const stored = await storage.save(pdfPath, result.document.text);

    if (args.format === 'json') {
      console.log(
        JSON.stringify(
          {
            documentId: result.documentId,
            source: pdfPath,
            output: stored.path,
            hash: stored.hash,
            pageCount: result.pageCount,
            segmentCount: result.segmentCount,
            model: result.model,
            characters: result.document.text.length,
            processingTime: result.processingTime,
          },
          null,
          2
        )
      );
    } else {
      if (echo) process.stdout.write('\n\n');
      reporter.complete(
        `Extracted ${result.pageCount} page(s) in ${result.segmentCount} segment(s) (${result.processingTime})`
      );
      console.log(`Saved extracted text to ${stored.path}`);
    }
  } catch (error) {
    logger.error({ error }, 'PDF extraction failed');
    reporter.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
};

await main();

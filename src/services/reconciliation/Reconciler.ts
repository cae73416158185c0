import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { InvalidInputError } from '../../utils/errors.js';
import { similarityThresholdSchema } from '../../config/validation.js';
import type { ReconciledDocument } from '../../domain/entities/index.js';
import { similarityRatio } from './SequenceMatcher.js';

/** Leading lines of a block that may repeat the previous block. */
export const PREFIX_LINE_WINDOW = 10;
/** Trailing lines of the previous block searched for that repetition. */
export const SUFFIX_LINE_WINDOW = 15;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

const unitsSchema = z.array(z.string({ invalid_type_error: 'Transcription unit must be a string' }));

const splitLines = (text: string): string[] => text.trim().split(/\r?\n/);

/**
 * Removes text duplicated across segment boundaries. Strips are transcribed
 * independently, so the band two strips share shows up at the end of one
 * block and again at the start of the next; the copy at the start of the later
 * block is dropped, leaving earlier blocks final.
 */
export class Reconciler {
  private readonly similarityThreshold: number;

  constructor(similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD) {
    const parsed = similarityThresholdSchema.safeParse(similarityThreshold);
    if (!parsed.success) {
      throw new InvalidInputError('similarityThreshold must be in [0, 1]', parsed.error.issues);
    }
    this.similarityThreshold = parsed.data;
  }

  reconcile(units: readonly string[]): string[] {
    const parsed = unitsSchema.safeParse(units);
    if (!parsed.success) {
      throw new InvalidInputError('Transcription units must all be strings', parsed.error.issues);
    }
    if (units.length <= 1) return [...units];

    const cleaned: string[] = [units[0]];

    for (let i = 1; i < units.length; i++) {
      const current = units[i];
      const overlapLines = this.findOverlap(current, cleaned[i - 1]);

      if (overlapLines > 0) {
        logger.debug({ unit: i, overlapLines }, 'Stripped duplicated lines');
        cleaned.push(splitLines(current).slice(overlapLines).join('\n'));
      } else {
        cleaned.push(current);
      }
    }

    return cleaned;
  }

  /**
   * Number of leading lines of `current` that repeat the tail of `previous`.
   * Every prefix length up to the window is tried and the largest one whose
   * text scores above the threshold against some tail of `previous` wins.
   */
  findOverlap(current: string, previous: string): number {
    const currentLines = splitLines(current);
    const previousLines = splitLines(previous);
    const firstTail = Math.max(0, previousLines.length - SUFFIX_LINE_WINDOW);
    const prefixLimit = Math.min(PREFIX_LINE_WINDOW, currentLines.length);
    let bestMatchEnd = 0;

    for (let j = 1; j <= prefixLimit; j++) {
      const currentSegment = currentLines.slice(0, j).join('\n').toLowerCase();

      for (let k = firstTail; k < previousLines.length; k++) {
        const previousSegment = previousLines.slice(k).join('\n').toLowerCase();
        if (similarityRatio(currentSegment, previousSegment) > this.similarityThreshold) {
          bestMatchEnd = j;
          break;
        }
      }
    }

    return bestMatchEnd;
  }

  /** Drops blank blocks, trims the rest and joins them with a blank line. */
  assemble(cleaned: readonly string[]): ReconciledDocument {
    const blocks = [...cleaned];
    const text = blocks
      .map(block => block.trim())
      .filter(block => block.length > 0)
      .join('\n\n');

    return { blocks, text };
  }

  reconcileDocument(units: readonly string[]): ReconciledDocument {
    return this.assemble(this.reconcile(units));
  }
}

import { createHash } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { DocumentStorageError } from '../../utils/errors.js';
import type { DocumentStorage, StoredDocument } from './DocumentStorage.interface.js';

export const EXTRACTED_SUFFIX = '_extracted.md';

/**
 * Writes `<name>_extracted.md` next to the source PDF, or into `outputDir`
 * when one is configured.
 */
export class FileSystemStorage implements DocumentStorage {
  constructor(private outputDir: string | undefined = config.storage.outputDir) {}

  outputPathFor(sourcePath: string): string {
    const stem = basename(sourcePath, extname(sourcePath));
    return join(this.outputDir ?? dirname(sourcePath), `${stem}${EXTRACTED_SUFFIX}`);
  }

  async save(sourcePath: string, text: string): Promise<StoredDocument> {
    const path = this.outputPathFor(sourcePath);
    try {
      await mkdir(dirname(path), { recursive: true });
      const content = Buffer.from(text, 'utf-8');
      await writeFile(path, content);

      const stored: StoredDocument = {
        path,
        hash: createHash('sha256').update(content).digest('hex'),
        size: content.length,
      };
      logger.debug({ sourcePath, path, size: stored.size }, 'Extracted text stored');

      return stored;
    } catch (error) {
      logger.error({ error, sourcePath, path }, 'Failed to store extracted text');
      throw new DocumentStorageError('Extracted text storage failed', error);
    }
  }
}

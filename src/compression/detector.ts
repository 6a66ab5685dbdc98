/**
 * Compression format detection for sequence files
 *
 * By file extension: `.gz` and `.gzip` are gzip, anything else is plain.
 */

import type { CompressionFormat } from '../types';
import { CompressionError } from '../errors';

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @example
   * ```typescript
   * CompressionDetector.fromExtension('/data/S1.fastq.gz'); // 'gzip'
   * ```
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalized = filePath.toLowerCase().replace(/\\/g, '/');
    return GZIP_EXTENSIONS.some((ext) => normalized.endsWith(ext)) ? 'gzip' : 'none';
  }
}

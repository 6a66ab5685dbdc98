/**
 * Gzip support for sequence files
 *
 * Streaming decompression for `.fastq.gz` inputs on fflate.
 */

import { Gunzip } from 'fflate';
import { CompressionError } from '../errors';

/**
 * Create gzip decompression transform stream
 *
 * Handles multi-member archives (concatenated gzip files are common for
 * merged sequencing lanes).
 *
 * @example
 * ```typescript
 * const raw = await createStream('S1.fastq.gz', { autoDecompress: false });
 * const text = raw.pipeThrough(createDecompressionStream());
 * ```
 */
export function createDecompressionStream(): TransformStream<Uint8Array, Uint8Array> {
  const gunzip = new Gunzip();

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      gunzip.ondata = (data: Uint8Array) => {
        if (data.length > 0) {
          controller.enqueue(data);
        }
      };
    },
    transform(chunk) {
      try {
        gunzip.push(chunk, false);
      } catch (error) {
        throw CompressionError.fromSystemError('gzip', 'decompress', error);
      }
    },
    flush() {
      try {
        gunzip.push(new Uint8Array(0), true);
      } catch (error) {
        throw CompressionError.fromSystemError('gzip', 'decompress', error);
      }
    },
  });
}

/**
 * Wrap a compressed readable stream with gzip decompression
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return input.pipeThrough(createDecompressionStream());
}

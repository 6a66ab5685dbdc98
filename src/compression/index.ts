/**
 * Compression module for sequence inputs
 *
 * @example Streaming decompression
 * ```typescript
 * import { CompressionDetector, wrapStream } from './compression';
 *
 * if (CompressionDetector.fromExtension(path) === 'gzip') {
 *   stream = wrapStream(stream);
 * }
 * ```
 */

export { CompressionDetector } from './detector';
export { createDecompressionStream, wrapStream } from './gzip';

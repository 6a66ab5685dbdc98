/**
 * TranslateProcessor - six-frame DNA to protein translation
 *
 * Streams nucleotide records and yields six protein records per input.
 * Frames 1..3 read the forward strand from offsets 0..2; frames -1..-3
 * read the reverse complement the same way.
 */

import { type } from 'arktype';
import { ConfigurationError } from '../errors';
import type { AbstractSequence } from '../types';
import { GeneticCode, getGeneticCode, translate } from './core/genetic-codes';
import { reverseComplement } from './core/sequence-manipulation';

export type ReadingFrame = 1 | 2 | 3 | -1 | -2 | -3;

const ALL_FRAMES: readonly ReadingFrame[] = [1, 2, 3, -1, -2, -3];

export interface TranslateOptions {
  /** NCBI genetic code table (default 1) */
  geneticCode?: number;
}

const TranslateOptionsSchema = type({
  'geneticCode?': 'number.integer>=1',
});

function validateTranslateOptions(options: TranslateOptions): void {
  const result = TranslateOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ConfigurationError(`Invalid translate options: ${result.summary}`, 'translate');
  }
  if (options.geneticCode !== undefined && getGeneticCode(options.geneticCode) === undefined) {
    throw ConfigurationError.forField('geneticCode', `unsupported genetic code ${options.geneticCode}`);
  }
}

/**
 * Build the id of a translated record, e.g. `read7_frame=-2`
 */
export function frameId(id: string, frame: ReadingFrame): string {
  return `${id}_frame=${frame}`;
}

/**
 * Strip a `_frame=<n>` suffix added by {@link frameId}
 */
export function stripFrameSuffix(id: string): string {
  const index = id.indexOf('_frame=');
  return index === -1 ? id : id.slice(0, index);
}

/**
 * Processor for six-frame translation, ids suffixed `_frame=<n>`
 *
 * @example
 * ```typescript
 * const processor = new TranslateProcessor();
 * const proteins = processor.process(reads, { geneticCode: 11 });
 * ```
 */
export class TranslateProcessor {
  async *process(
    source: AsyncIterable<AbstractSequence>,
    options: TranslateOptions = {}
  ): AsyncIterable<AbstractSequence> {
    validateTranslateOptions(options);

    const geneticCode = options.geneticCode ?? GeneticCode.STANDARD;

    for await (const seq of source) {
      const dna = seq.sequence.toUpperCase().replace(/U/g, 'T');
      const revComp = reverseComplement(dna);

      for (const frame of ALL_FRAMES) {
        const strand = frame < 0 ? revComp : dna;
        const protein = translate(strand, geneticCode, frameOffset(frame));
        yield {
          id: frameId(seq.id, frame),
          ...(seq.description !== undefined && { description: seq.description }),
          sequence: protein,
          length: protein.length,
        };
      }
    }
  }
}

function frameOffset(frame: ReadingFrame): 0 | 1 | 2 {
  switch (Math.abs(frame)) {
    case 1:
      return 0;
    case 2:
      return 1;
    default:
      return 2;
  }
}

/**
 * SeqOps - pipeline-style sequence operations
 *
 * Chains the sequence toolkit operations the pipeline needs (ID-list
 * subsetting, FASTQ→FASTA conversion, exact dedup, six-frame translation)
 * over a lazy async iterable. Nothing is read until `writeFasta` runs or
 * the chain is iterated.
 *
 * @example
 * ```typescript
 * const extracted = await SeqOps.fromFastq("reads/S1.fastq.gz")
 *   .grep({ ids: readIds })
 *   .toFastaSequence()
 *   .writeFasta("S1_dna_seqs/target_dna_sequences.fa", { wrapWidth: 0 });
 * ```
 */

import { FastaParser, FastaWriter, FastqParser } from "../formats";
import { openForWriting } from "../io/file-writer";
import type { AbstractSequence, FastaSequence, FastqSequence } from "../types";
import { fastqToFasta } from "./convert";
import { type GrepOptions, GrepProcessor } from "./grep";
import { type RmdupOptions, RmdupProcessor } from "./rmdup";
import { TranslateProcessor } from "./translate";

const WRITE_CHUNK_SIZE = 65536;

export class SeqOps<T extends AbstractSequence> {
  constructor(private readonly source: AsyncIterable<T>) {}

  static fromFasta(path: string): SeqOps<FastaSequence> {
    return new SeqOps(new FastaParser().parseFile(path));
  }

  /**
   * Stream reads from a FASTQ file; `.gz` inputs are decompressed on the fly
   */
  static fromFastq(path: string): SeqOps<FastqSequence> {
    return new SeqOps(new FastqParser().parseFile(path));
  }

  static fromArray<T extends AbstractSequence>(sequences: readonly T[]): SeqOps<T> {
    return new SeqOps(
      (async function* () {
        yield* sequences;
      })()
    );
  }

  /**
   * Keep records whose ID is in the list
   */
  grep(options: GrepOptions): SeqOps<T> {
    return new SeqOps(new GrepProcessor().process(this.source, options));
  }

  /**
   * Drop duplicates, keeping the first occurrence
   *
   * @example
   * ```typescript
   * seqops(records).rmdup("sequence"); // collapse identical residues
   * ```
   */
  rmdup(by: RmdupOptions["by"] | RmdupOptions): SeqOps<T> {
    const options = typeof by === "string" ? { by } : by;
    return new SeqOps(new RmdupProcessor().process(this.source, options));
  }

  /**
   * Translate in all six frames with ids suffixed `_frame=<n>`
   */
  translateAllFrames(geneticCode: number = 1): SeqOps<AbstractSequence> {
    return new SeqOps(new TranslateProcessor().process(this.source, { geneticCode }));
  }

  toFastaSequence<U extends T & FastqSequence>(this: SeqOps<U>): SeqOps<FastaSequence> {
    const source = this.source;
    return new SeqOps(
      (async function* () {
        for await (const read of source) {
          yield fastqToFasta(read);
        }
      })()
    );
  }

  /**
   * Write every record to a FASTA file
   *
   * @returns Number of records written
   */
  async writeFasta(path: string, options: { wrapWidth?: number } = {}): Promise<number> {
    const writer = new FastaWriter({
      ...(options.wrapWidth !== undefined && { lineWidth: options.wrapWidth }),
    });
    const source = this.source;

    return openForWriting(path, async (handle) => {
      let written = 0;
      let pending = "";
      for await (const seq of source) {
        pending += writer.formatSequence(seq);
        written++;
        if (pending.length >= WRITE_CHUNK_SIZE) {
          await handle.writeString(pending);
          pending = "";
        }
      }
      if (pending !== "") {
        await handle.writeString(pending);
      }
      return written;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.source[Symbol.asyncIterator]();
  }
}

export function seqops<T extends AbstractSequence>(source: AsyncIterable<T>): SeqOps<T> {
  return new SeqOps(source);
}

export { fastqToFasta } from "./convert";
export { GrepProcessor, type GrepOptions } from "./grep";
export { RmdupProcessor, type RmdupOptions } from "./rmdup";
export {
  frameId,
  stripFrameSuffix,
  TranslateProcessor,
  type ReadingFrame,
  type TranslateOptions,
} from "./translate";

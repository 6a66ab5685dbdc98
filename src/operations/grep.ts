/**
 * GrepProcessor - ID-list selection of sequences
 *
 * Bulk exact-ID lookup used to pull a few thousand reads out of a
 * multi-gigabyte FASTQ.
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import type { AbstractSequence } from "../types";

export interface GrepOptions {
  /** Exact identifiers to keep; compared against the record ID */
  ids: ReadonlySet<string>;
}

const GrepOptionsSchema = type({
  ids: "Set",
});

/**
 * @example
 * ```typescript
 * const processor = new GrepProcessor();
 * const selected = processor.process(reads, { ids: new Set(["read1", "read7"]) });
 * ```
 */
export class GrepProcessor {
  async *process<T extends AbstractSequence>(
    source: AsyncIterable<T>,
    options: GrepOptions
  ): AsyncIterable<T> {
    const validationResult = GrepOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ConfigurationError(`Invalid grep options: ${validationResult.summary}`, "grep");
    }

    const { ids } = options;
    for await (const seq of source) {
      if (ids.has(seq.id)) {
        yield seq;
      }
    }
  }
}

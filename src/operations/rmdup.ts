/**
 * RmdupProcessor - exact sequence deduplication
 *
 * Keeps the first record for each distinct sequence and drops later
 * duplicates, so the output order is the input order minus the duplicates.
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import type { AbstractSequence } from "../types";
import { ExactDeduplicator } from "./core/sequence-deduplicator";

export interface RmdupOptions {
  /** What makes two records duplicates */
  by: "sequence";
}

const RmdupOptionsSchema = type({
  by: "'sequence'",
});

/**
 * @example
 * ```typescript
 * const processor = new RmdupProcessor();
 * for await (const unique of processor.process(reads, { by: "sequence" })) {
 *   ...
 * }
 * ```
 */
export class RmdupProcessor {
  async *process<T extends AbstractSequence>(
    source: AsyncIterable<T>,
    options: RmdupOptions
  ): AsyncIterable<T> {
    const validationResult = RmdupOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ConfigurationError(`Invalid rmdup options: ${validationResult.summary}`, "rmdup");
    }

    yield* new ExactDeduplicator().deduplicate(source);
  }
}

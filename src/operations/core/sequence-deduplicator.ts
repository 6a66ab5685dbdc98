/**
 * Exact sequence deduplication
 *
 * @module sequence-deduplicator
 */

import type { AbstractSequence } from "../../types";

/**
 * Set-backed deduplicator keyed on exact residues, case included. The first occurrence of each
 * sequence wins and input order is preserved; identifiers are ignored.
 *
 * @example
 * ```typescript
 * const exact = new ExactDeduplicator();
 * for await (const unique of exact.deduplicate(sequences)) {
 *   console.log(unique.id);
 * }
 * ```
 */
export class ExactDeduplicator {
  private readonly seen = new Set<string>();

  async *deduplicate<T extends AbstractSequence>(sequences: AsyncIterable<T>): AsyncGenerator<T> {
    for await (const seq of sequences) {
      if (this.seen.has(seq.sequence)) {
        continue;
      }
      this.seen.add(seq.sequence);
      yield seq;
    }
  }
}

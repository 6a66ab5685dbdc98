/**
 * Tests for ExactDeduplicator
 */

import { describe, expect, test } from "vitest";
import { ExactDeduplicator } from "../../../src/operations/core/sequence-deduplicator";
import type { AbstractSequence } from "../../../src/types";

const seq = (id: string, sequence: string): AbstractSequence => ({ id, sequence, length: sequence.length });

async function run(dedup: ExactDeduplicator, records: AbstractSequence[]): Promise<string[]> {
  const out: string[] = [];
  const source = (async function* () {
    yield* records;
  })();
  for await (const record of dedup.deduplicate(source)) out.push(record.id);
  return out;
}

describe("ExactDeduplicator", () => {
  test("keys on residues and ignores identifiers", async () => {
    const dedup = new ExactDeduplicator();
    expect(await run(dedup, [seq("a", "AC"), seq("b", "AC"), seq("a", "GT"), seq("c", "ac")])).toEqual([
      "a",
      "a",
      "c",
    ]);
  });

  test("keys persist across calls on one instance", async () => {
    const dedup = new ExactDeduplicator();
    expect(await run(dedup, [seq("a", "AC")])).toEqual(["a"]);
    expect(await run(dedup, [seq("b", "AC"), seq("c", "GT")])).toEqual(["c"]);
  });
});

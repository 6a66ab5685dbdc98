/**
 * Tests for exact deduplication
 */

import { describe, expect, test } from "vitest";
import { SeqOps } from "../../src/operations";
import type { AbstractSequence } from "../../src/types";

const seq = (id: string, sequence: string): AbstractSequence => ({ id, sequence, length: sequence.length });

const RECORDS = [seq("a", "ACGT"), seq("b", "ACGT"), seq("a", "TTTT"), seq("c", "acgt"), seq("d", "GG")];

async function collect(source: AsyncIterable<AbstractSequence>): Promise<AbstractSequence[]> {
  const out: AbstractSequence[] = [];
  for await (const record of source) out.push(record);
  return out;
}

describe("rmdup", () => {
  test("by sequence keeps the first occurrence in input order", async () => {
    const out = await collect(SeqOps.fromArray(RECORDS).rmdup("sequence"));
    expect(out.map((s) => `${s.id}:${s.sequence}`)).toEqual(["a:ACGT", "a:TTTT", "c:acgt", "d:GG"]);
  });

  test("sequences differing by one residue both survive", async () => {
    const out = await collect(SeqOps.fromArray([seq("x", "ACGT"), seq("y", "ACGA")]).rmdup({ by: "sequence" }));
    expect(out.map((s) => s.id)).toEqual(["x", "y"]);
  });

});

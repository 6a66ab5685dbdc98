/**
 * Tests for six-frame translation
 */

import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../../src/errors";
import { frameId, SeqOps, stripFrameSuffix, TranslateProcessor } from "../../src/operations";
import type { AbstractSequence } from "../../src/types";

async function collect(source: AsyncIterable<AbstractSequence>): Promise<AbstractSequence[]> {
  const out: AbstractSequence[] = [];
  for await (const seq of source) out.push(seq);
  return out;
}

async function* from(...sequences: AbstractSequence[]): AsyncIterable<AbstractSequence> {
  yield* sequences;
}

const dna = (id: string, sequence: string, description?: string): AbstractSequence => ({
  id,
  sequence,
  length: sequence.length,
  ...(description !== undefined && { description }),
});

describe("TranslateProcessor", () => {
  const processor = new TranslateProcessor();

  test("six frames in order 1, 2, 3, -1, -2, -3", async () => {
    // reverse complement of ATGGCC is GGCCAT
    const out = await collect(processor.process(from(dna("r1", "ATGGCC", "S1"))));
    expect(out.map((s) => [s.id, s.sequence, s.description])).toEqual([
      ["r1_frame=1", "MA", "S1"],
      ["r1_frame=2", "W", "S1"],
      ["r1_frame=3", "G", "S1"],
      ["r1_frame=-1", "GH", "S1"],
      ["r1_frame=-2", "A", "S1"],
      ["r1_frame=-3", "P", "S1"],
    ]);
  });

  test("lowercase and RNA input", async () => {
    const out = await collect(processor.process(from(dna("r1", "augtaa"))));
    expect(out[0]).toEqual({ id: "r1_frame=1", sequence: "M*", length: 2 });
  });

  test("unknown genetic code", async () => {
    await expect(collect(processor.process(from(dna("r1", "ATG")), { geneticCode: 99 }))).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

describe("SeqOps.translateAllFrames", () => {
  test("six records per input sequence", async () => {
    const out = await collect(SeqOps.fromArray([dna("a", "ATGAAA"), dna("b", "TTTCAT")]).translateAllFrames(11));
    expect(out).toHaveLength(12);
    expect(out[0]).toEqual({ id: "a_frame=1", sequence: "MK", length: 2 });
    expect(out[9]).toEqual({ id: "b_frame=-1", sequence: "MK", length: 2 });
  });
});

describe("frame ids", () => {
  test("frameId and stripFrameSuffix invert each other", () => {
    expect(frameId("read7", -2)).toBe("read7_frame=-2");
    expect(stripFrameSuffix("read7_frame=-2")).toBe("read7");
    expect(stripFrameSuffix("read7")).toBe("read7");
  });
});

/**
 * Tests for FASTQ parsing
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync, strToU8 } from "fflate";
import { ConfigurationError, FileError, ParseError } from "../../src/errors";
import { FastqParser } from "../../src/formats";
import type { FastqSequence } from "../../src/types";

async function collect(source: AsyncIterable<FastqSequence>): Promise<FastqSequence[]> {
  const out: FastqSequence[] = [];
  for await (const read of source) out.push(read);
  return out;
}

describe("FastqParser", () => {
  const parser = new FastqParser();

  test("parses a four-line record", async () => {
    const reads = await collect(parser.parseString("@r1 lane=1\nACGT\n+\nIIII\n"));
    expect(reads).toEqual([
      {
        format: "fastq",
        id: "r1",
        description: "lane=1",
        sequence: "ACGT",
        quality: "IIII",
        length: 4,
        lineNumber: 1,
      },
    ]);
  });

  test("tolerates blank lines between records and CRLF endings", async () => {
    const reads = await collect(parser.parseString("@r1\r\nAC\r\n+r1\r\nII\r\n\r\n@r2\nGT\n+\nII\n"));
    expect(reads.map((r) => [r.id, r.sequence, r.lineNumber])).toEqual([
      ["r1", "AC", 1],
      ["r2", "GT", 6],
    ]);
  });

  test("truncated record", async () => {
    await expect(collect(parser.parseString("@r1\nAC\n+\nII\n@r2\nAC\n"))).rejects.toBeInstanceOf(ParseError);
  });

  test("missing header marker", async () => {
    await expect(collect(parser.parseString("r1\nAC\n+\nII\n"))).rejects.toThrow("Expected '@' header");
  });

  test("quality length mismatch", async () => {
    await expect(collect(parser.parseString("@r1\nACG\n+\nII\n"))).rejects.toThrow(
      "Quality length 2 does not match sequence length 3"
    );
  });

  test("errors can be collected instead of thrown", async () => {
    const errors: Array<[string, number | undefined]> = [];
    const lenient = new FastqParser({ onError: (error, line) => errors.push([error, line]) });

    const reads = await collect(lenient.parseString("@r1\nACG\n+\nII\n@r2\nAC\n+\nII\n"));

    expect(reads.map((r) => r.id)).toEqual(["r2"]);
    expect(errors).toEqual([["Quality length 2 does not match sequence length 3", 4]]);
  });

  test("quality length check can be disabled", async () => {
    const reads = await collect(new FastqParser({ validateQualityLength: false }).parseString("@r1\nACG\n+\nI\n"));
    expect(reads[0]?.quality).toBe("I");
  });

  test("rejects a non-positive line limit", () => {
    expect(() => new FastqParser({ maxLineLength: 0 })).toThrow(ConfigurationError);
  });
});

describe("FastqParser files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fastq-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads plain and gzipped files alike", async () => {
    const text = "@r1\nAC\n+\nII\n@r2\nGT\n+\nII\n";
    writeFileSync(join(dir, "S1.fastq"), text);
    writeFileSync(join(dir, "S1.fastq.gz"), gzipSync(strToU8(text)));

    const plain = await collect(new FastqParser().parseFile(join(dir, "S1.fastq")));
    const gz = await collect(new FastqParser().parseFile(join(dir, "S1.fastq.gz")));

    expect(gz).toEqual(plain);
    expect(plain.map((r) => r.id)).toEqual(["r1", "r2"]);
  });

  test("multi-member gzip reads as one stream", async () => {
    const path = join(dir, "merged.fastq.gz");
    const first = gzipSync(strToU8("@r1\nAC\n+\nII\n"));
    const second = gzipSync(strToU8("@r2\nGT\n+\nII\n"));
    const merged = new Uint8Array(first.length + second.length);
    merged.set(first);
    merged.set(second, first.length);
    writeFileSync(path, merged);

    const reads = await collect(new FastqParser().parseFile(path));
    expect(reads.map((r) => r.id)).toEqual(["r1", "r2"]);
  });

  test("missing file", async () => {
    await expect(collect(new FastqParser().parseFile(join(dir, "absent.fastq")))).rejects.toBeInstanceOf(
      FileError
    );
  });
});

/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector.fromExtension", () => {
  test.each([
    ["reads/S1.fastq.gz", "gzip"],
    ["reads/S1.FASTQ.GZ", "gzip"],
    ["archive.gzip", "gzip"],
    ["C:\\data\\S1.fq.gz", "gzip"],
    ["reads/S1.fastq", "none"],
    ["gz/S1.fastq", "none"],
  ])("%s -> %s", (path, format) => {
    expect(CompressionDetector.fromExtension(path)).toBe(format);
  });

  test("empty path", () => {
    expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
  });
});

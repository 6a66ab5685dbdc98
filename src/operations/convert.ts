/**
 * FASTQ to FASTA conversion
 *
 * Drops the quality line and keeps the header (identifier and description)
 * unchanged.
 */

import type { FastaSequence, FastqSequence } from "../types";

export function fastqToFasta(read: FastqSequence): FastaSequence {
  return {
    format: "fasta",
    id: read.id,
    ...(read.description !== undefined && { description: read.description }),
    sequence: read.sequence,
    length: read.length,
    ...(read.lineNumber !== undefined && { lineNumber: read.lineNumber }),
  };
}

/**
 * NCBI genetic code tables
 *
 * Tables are stored in the NCBI 64-character layout (codons ordered by
 * first, second, third base over T, C, A, G) in `genetic-codes.json` and
 * expanded into codon maps on first use.
 *
 * @module genetic-codes
 */

import { type } from "arktype";
import { ConfigurationError } from "../../errors";
import rawCodes from "./genetic-codes.json";

export enum GeneticCode {
  STANDARD = 1,
  BACTERIAL_PLASTID = 11,
}

interface CodonTable {
  readonly [codon: string]: string;
}

interface GeneticCodeDefinition {
  readonly id: number;
  readonly codons: CodonTable;
}

const GeneticCodeFileSchema = type({
  bases: "string==4",
  tables: type({
    id: "number.integer>0",
    aminoAcids: "string==64",
  }).array(),
});

let codeCache: Map<number, GeneticCodeDefinition> | undefined;

function loadCodes(): Map<number, GeneticCodeDefinition> {
  if (codeCache) return codeCache;

  const parsed = GeneticCodeFileSchema(rawCodes);
  if (parsed instanceof type.errors) {
    throw new ConfigurationError(`Invalid genetic code data: ${parsed.summary}`);
  }

  const bases = parsed.bases.split("");
  const codes = new Map<number, GeneticCodeDefinition>();

  for (const table of parsed.tables) {
    const codons: Record<string, string> = {};
    let index = 0;
    for (const first of bases) {
      for (const second of bases) {
        for (const third of bases) {
          const codon = first + second + third;
          codons[codon] = table.aminoAcids.charAt(index);
          index++;
        }
      }
    }
    codes.set(table.id, { id: table.id, codons });
  }

  codeCache = codes;
  return codes;
}

/**
 * Get a genetic code definition by NCBI id
 */
export function getGeneticCode(codeId: number): GeneticCodeDefinition | undefined {
  return loadCodes().get(codeId);
}

/**
 * Translate DNA/RNA in one reading frame
 *
 * Trailing bases that do not fill a codon are dropped. Codons containing
 * anything other than A, C, G, T translate to `X`; stops translate to `*`.
 *
 * @example
 * ```typescript
 * translate("ATGGGATCC", GeneticCode.BACTERIAL_PLASTID, 0); // 'MGS'
 * translate("ATGGGATCC", GeneticCode.BACTERIAL_PLASTID, 1); // 'WD'
 * ```
 *
 * @param frame - offset of the first codon: 0, 1 or 2
 * @throws {ConfigurationError} For an unknown genetic code
 */
export function translate(
  sequence: string,
  codeId: number = GeneticCode.STANDARD,
  frame: 0 | 1 | 2 = 0
): string {
  const code = getGeneticCode(codeId);
  if (!code) {
    throw new ConfigurationError(`Unknown genetic code: ${codeId}`, "geneticCode");
  }

  const dna = sequence.toUpperCase().replace(/U/g, "T");
  let protein = "";
  for (let i = frame; i + 2 < dna.length; i += 3) {
    protein += code.codons[dna.substring(i, i + 3)] ?? "X";
  }
  return protein;
}

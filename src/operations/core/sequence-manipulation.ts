/**
 * Core sequence manipulation operations
 *
 * Complement and reverse-complement with IUPAC ambiguity codes. Case is
 * preserved and unknown characters pass through unchanged.
 *
 * @module sequence-manipulation
 */

const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
  U: "A",
  R: "Y",
  Y: "R", // purines <-> pyrimidines
  S: "S",
  W: "W",
  K: "M",
  M: "K",
  B: "V",
  V: "B",
  D: "H",
  H: "D",
  N: "N",
  "-": "-",
  ".": ".",
};

/**
 * @example
 * ```typescript
 * complement("ATCGn"); // 'TAGCn'
 * ```
 */
export function complement(sequence: string): string {
  let result = "";
  for (const base of sequence) {
    const comp = DNA_COMPLEMENT_MAP[base.toUpperCase()];
    if (comp === undefined) {
      result += base;
    } else {
      result += base === base.toLowerCase() ? comp.toLowerCase() : comp;
    }
  }
  return result;
}

export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * @example
 * ```typescript
 * reverseComplement("ATGC"); // 'GCAT'
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}

/**
 * Validation fingerprint
 *
 * SHA-256 over the search parameters and the translated query file. A
 * rerun compares it with the fingerprint of the latest recorded run to
 * notice that the cached hit table was produced from different inputs.
 */

import { createHash } from "node:crypto";
import { createStream, exists } from "../io/file-reader";

export interface FingerprintInput {
  readonly database: string;
  readonly evalue: number;
  readonly maxTargets: number;
  readonly sensitive: boolean;
  /** Translated protein FASTA searched by the validation engine */
  readonly translatedPath: string;
}

/**
 * @returns Lowercase hex digest; a missing translated file hashes as empty
 */
export async function validationFingerprint(input: FingerprintInput): Promise<string> {
  const hasher = createHash("sha256");
  hasher.update(
    [
      `database=${input.database}`,
      `evalue=${input.evalue}`,
      `max-targets=${input.maxTargets}`,
      `sensitive=${input.sensitive}`,
    ].join("\n")
  );
  hasher.update("\n\n");

  if (await exists(input.translatedPath)) {
    const reader = (await createStream(input.translatedPath)).getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        hasher.update(value);
      }
    } finally {
      reader.releaseLock();
    }
  }

  return hasher.digest("hex");
}

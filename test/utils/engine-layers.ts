/**
 * In-process engine layers for pipeline tests
 *
 * Translation runs for real (it is in-process already); the validation
 * engine is replaced by one that writes a canned hit table, so no DIAMOND
 * binary or database is needed.
 *
 * Usage:
 * ```typescript
 * const searches: ValidationRequest[] = [];
 * await runValidationStage(config, testEngines(HITS, searches));
 * expect(searches).toHaveLength(1);
 * ```
 */

import { writeFileSync } from "node:fs";
import { Effect, Layer } from "effect";
import { DownstreamToolFailure } from "../../src/errors";
import {
  SixFrameTranslationLive,
  type TranslationEngine,
  ValidationEngine,
  type ValidationRequest,
} from "../../src/pipeline/engines";

/**
 * Validation engine that writes `hitTable` to the requested output
 */
export function cannedValidationLayer(
  hitTable: string,
  searches: ValidationRequest[] = []
): Layer.Layer<ValidationEngine> {
  return Layer.succeed(ValidationEngine, {
    search: (request) =>
      Effect.sync(() => {
        searches.push(request);
        writeFileSync(request.output, hitTable);
      }),
  });
}

/**
 * Validation engine that fails the way a crashed DIAMOND run does
 */
export function failingValidationLayer(exitCode: number): Layer.Layer<ValidationEngine> {
  return Layer.succeed(ValidationEngine, {
    search: () =>
      Effect.fail(new DownstreamToolFailure(`diamond blastp exited with code ${exitCode}`, "diamond", exitCode)),
  });
}

export function testEngines(
  hitTable: string,
  searches: ValidationRequest[] = []
): Layer.Layer<TranslationEngine | ValidationEngine> {
  return Layer.merge(SixFrameTranslationLive, cannedValidationLayer(hitTable, searches));
}

/**
 * External engines as Effect services
 *
 * The validation stage only talks to {@link TranslationEngine} and
 * {@link ValidationEngine}; which implementation runs is decided by the
 * layer the caller provides.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const engine = yield* ValidationEngine;
 *   yield* engine.search({ query, database, output, maxTargets: 5, evalue: 1e-3, threads: 8, sensitive: false });
 * });
 *
 * await runPromise(program.pipe(Effect.provide(EnginesLive)));
 * ```
 */

import { Context, Effect, Layer } from "effect";
import { DownstreamToolFailure, isPipelineError, type PipelineError } from "../errors";
import { SeqOps } from "../operations";

export interface TranslationRequest {
  /** Nucleotide FASTA */
  readonly input: string;
  /** Protein FASTA, one record per frame */
  readonly output: string;
  readonly geneticCode: number;
}

export interface TranslationEngineShape {
  /**
   * Translate every input record in six frames
   *
   * @returns Number of protein records written
   */
  readonly translate: (request: TranslationRequest) => Effect.Effect<number, PipelineError>;
}

export interface ValidationRequest {
  /** Protein FASTA to search */
  readonly query: string;
  readonly database: string;
  /** Tab-separated hits: query, subject, identity, length, e-value, bitscore */
  readonly output: string;
  readonly maxTargets: number;
  readonly evalue: number;
  readonly threads: number;
  readonly sensitive: boolean;
}

export interface ValidationEngineShape {
  readonly search: (request: ValidationRequest) => Effect.Effect<void, DownstreamToolFailure>;
}

export class TranslationEngine extends Context.Tag("peptide-harvest/TranslationEngine")<
  TranslationEngine,
  TranslationEngineShape
>() {}

export class ValidationEngine extends Context.Tag("peptide-harvest/ValidationEngine")<
  ValidationEngine,
  ValidationEngineShape
>() {}

/**
 * In-process six-frame translation; ids gain a `_frame=<n>` suffix
 */
export const SixFrameTranslationLive: Layer.Layer<TranslationEngine> = Layer.succeed(TranslationEngine, {
  translate: (request) =>
    Effect.tryPromise({
      try: () =>
        SeqOps.fromFasta(request.input)
          .translateAllFrames(request.geneticCode)
          .writeFasta(request.output, { wrapWidth: 0 }),
      catch: (error) =>
        isPipelineError(error)
          ? error
          : new DownstreamToolFailure(
              `Six-frame translation failed: ${error instanceof Error ? error.message : String(error)}`,
              "translate"
            ),
    }),
});

/**
 * `ByteParser` service: the parsers bound to a configured standard, strict
 * bit mode and rounding, with logging around every call.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"
import type { ParseError } from "./Errors.js"
import {
  parseRateEffect,
  parseSizeBigEffect,
  parseSizeEffect,
  tryParseSize,
} from "./Parsing.js"
import type {
  BigSizeReading,
  ByteStandard,
  DimensionedValue,
  ParseOutcome,
  RoundingMode,
} from "./Types.js"

/**
 * @since 0.1.0
 * @category Configuration
 */
export interface ByteParserOptions {
  readonly standard: ByteStandard
  readonly strictBits: boolean
  readonly rounding: RoundingMode
}

/**
 * Reads `BYTE_PARSER_STANDARD`, `BYTE_PARSER_STRICT_BITS` and
 * `BYTE_PARSER_ROUNDING`.
 *
 * @since 0.1.0
 * @category Configuration
 */
export const ByteParserConfig: Config.Config<ByteParserOptions> = Config.all({
  standard: Config.literal("si", "iec", "jedec")("BYTE_PARSER_STANDARD").pipe(
    Config.withDefault("si" as const),
  ),
  strictBits: Config.boolean("BYTE_PARSER_STRICT_BITS").pipe(Config.withDefault(false)),
  rounding: Config.literal("floor", "ceil", "round")("BYTE_PARSER_ROUNDING").pipe(
    Config.withDefault("round" as const),
  ),
})

/**
 * @since 0.1.0
 * @category Models
 */
export interface ByteParserService {
  readonly options: ByteParserOptions
  readonly parseSize: (
    input: string,
    standard?: ByteStandard,
  ) => Effect.Effect<DimensionedValue, ParseError>
  readonly parseRate: (
    input: string,
    standard?: ByteStandard,
  ) => Effect.Effect<DimensionedValue, ParseError>
  readonly parseSizeBig: (
    input: string,
    rounding?: RoundingMode,
  ) => Effect.Effect<BigSizeReading, ParseError>
  readonly tryParseSize: (
    input: string,
    standard?: ByteStandard,
  ) => Effect.Effect<ParseOutcome<DimensionedValue>>
}

const logged = <A>(
  operation: string,
  input: string,
  standard: ByteStandard,
  effect: Effect.Effect<A, ParseError>,
): Effect.Effect<A, ParseError> =>
  effect.pipe(
    Effect.tap(() => Effect.logDebug(`${operation} succeeded`)),
    Effect.tapError((error) =>
      Effect.logWarning(`${operation} failed: ${error.message}`).pipe(
        Effect.annotateLogs("errorTag", error._tag),
      ),
    ),
    Effect.annotateLogs({ input, standard }),
  )

const make = (options: ByteParserOptions): ByteParserService => ({
  options,
  parseSize: (input, standard = options.standard) =>
    logged("parseSize", input, standard, parseSizeEffect(input, standard, options.strictBits)),
  parseRate: (input, standard = options.standard) =>
    logged("parseRate", input, standard, parseRateEffect(input, standard, options.strictBits)),
  parseSizeBig: (input, rounding = options.rounding) =>
    logged(
      "parseSizeBig",
      input,
      options.standard,
      parseSizeBigEffect(input, options.standard, options.strictBits, rounding),
    ),
  tryParseSize: (input, standard = options.standard) =>
    Effect.sync(() => tryParseSize(input, standard, options.strictBits)).pipe(
      Effect.tap((outcome) =>
        outcome.isSuccess
          ? Effect.logDebug("tryParseSize succeeded")
          : Effect.logWarning(`tryParseSize failed: ${outcome.error?.message ?? "unknown error"}`),
      ),
      Effect.annotateLogs({ input, standard }),
    ),
})

/**
 * @since 0.1.0
 * @category Defaults
 */
export const defaultByteParserOptions: ByteParserOptions = {
  standard: "si",
  strictBits: false,
  rounding: "round",
}

/**
 * @since 0.1.0
 * @category Tags
 */
export class ByteParser extends Context.Tag("byte-quantity/ByteParser")<
  ByteParser,
  ByteParserService
>() {
  /** Options read from configuration. */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const options = yield* ByteParserConfig
      yield* Effect.logDebug("ByteParser configured").pipe(
        Effect.annotateLogs({
          standard: options.standard,
          strictBits: options.strictBits,
          rounding: options.rounding,
        }),
      )
      return make(options)
    }),
  )

  /** Explicit options, no configuration read. */
  static readonly layerWith = (options: Partial<ByteParserOptions> = {}) =>
    Layer.succeed(this, make({ ...defaultByteParserOptions, ...options }))
}

/**
 * Entry points for parsing sizes, rates and durations.
 *
 * Each parser comes in four shapes: a throwing function (`parseSize`), an
 * `Either` variant (`parseSizeEither`), an `Effect` variant
 * (`parseSizeEffect`) and a non-throwing `try*` variant that reports the
 * outcome together with the detected unit. Inputs without operators are read
 * as one literal and keep their detected unit; anything else is evaluated as
 * an expression.
 *
 * @since 0.1.0
 */

import { Effect, Either, identity } from "effect"
import type { ParseError } from "./Errors.js"
import { readSizeBig } from "./internal/parsing/BigSize.js"
import { parseDurationLiteral } from "./internal/parsing/DurationLiteral.js"
import { readRate, readSize, type Reading } from "./internal/parsing/Readings.js"
import { collapseWhitespace } from "./internal/parsing/text.js"
import type {
  BigSizeReading,
  ByteStandard,
  DimensionedValue,
  ParseOutcome,
  RoundingMode,
} from "./Types.js"

const failedOutcome = <A>(input: string, error: ParseError): ParseOutcome<A> => ({
  isSuccess: false,
  originalInput: input,
  normalizedInput: collapseWhitespace(input),
  isBitInput: false,
  error,
})

const toOutcome = (
  input: string,
  result: Either.Either<Reading, ParseError>,
): ParseOutcome<DimensionedValue> =>
  Either.match(result, {
    onLeft: (error) => failedOutcome<DimensionedValue>(input, error),
    onRight: (reading) => ({
      isSuccess: true,
      value: reading.value,
      originalInput: input,
      normalizedInput: reading.normalizedInput,
      detectedUnitSymbol: reading.detectedUnitSymbol,
      isBitInput: reading.isBitInput,
      rawNumericValue: reading.rawNumericValue,
    }),
  })

// -----------------------------------------------------------------------------
// sizes
// -----------------------------------------------------------------------------

/**
 * @since 0.1.0
 * @category Sizes
 */
export const parseSizeEither = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): Either.Either<DimensionedValue, ParseError> =>
  Either.map(readSize(input, standard, strictBits), (reading) => reading.value)

/**
 * Parses a size literal or expression into bytes.
 *
 * @since 0.1.0
 * @category Sizes
 * @example
 * ```ts
 * parseSize("1.5 GB").magnitude // 1500000000
 * parseSize("1 MB", "jedec").magnitude // 1048576
 * parseSize("1 GB + 512 MB").magnitude // 1500000000
 * ```
 */
export const parseSize = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): DimensionedValue => Either.getOrThrowWith(parseSizeEither(input, standard, strictBits), identity)

/**
 * @since 0.1.0
 * @category Sizes
 */
export const tryParseSize = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): ParseOutcome<DimensionedValue> => toOutcome(input, readSize(input, standard, strictBits))

/**
 * @since 0.1.0
 * @category Sizes
 */
export const parseSizeEffect = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): Effect.Effect<DimensionedValue, ParseError> =>
  Effect.suspend(() => parseSizeEither(input, standard, strictBits))

// -----------------------------------------------------------------------------
// rates
// -----------------------------------------------------------------------------

/**
 * @since 0.1.0
 * @category Rates
 */
export const parseRateEither = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): Either.Either<DimensionedValue, ParseError> =>
  Either.map(readRate(input, standard, strictBits), (reading) => reading.value)

/**
 * Parses a rate literal or expression into bytes per second.
 *
 * @since 0.1.0
 * @category Rates
 * @example
 * ```ts
 * parseRate("100 Mbps").magnitude // 12500000
 * bitsPerSecond(parseRate("12.5 MB/s")) // 100000000
 * ```
 */
export const parseRate = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): DimensionedValue => Either.getOrThrowWith(parseRateEither(input, standard, strictBits), identity)

/**
 * @since 0.1.0
 * @category Rates
 */
export const tryParseRate = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): ParseOutcome<DimensionedValue> => toOutcome(input, readRate(input, standard, strictBits))

/**
 * @since 0.1.0
 * @category Rates
 */
export const parseRateEffect = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
): Effect.Effect<DimensionedValue, ParseError> =>
  Effect.suspend(() => parseRateEither(input, standard, strictBits))

/**
 * @since 0.1.0
 * @category Rates
 */
export const bitsPerSecond = (rate: DimensionedValue): number => rate.magnitude * 8

// -----------------------------------------------------------------------------
// arbitrary precision
// -----------------------------------------------------------------------------

/**
 * @since 0.1.0
 * @category Big sizes
 */
export const parseSizeBigEither = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
  rounding: RoundingMode = "round",
): Either.Either<BigSizeReading, ParseError> => readSizeBig(input, standard, strictBits, rounding)

/**
 * Parses a size into a `bigint` byte count. Integer literals over units with
 * a whole number of bytes are exact at any magnitude; everything else is
 * rounded from the double-precision result.
 *
 * @since 0.1.0
 * @category Big sizes
 * @example
 * ```ts
 * parseSizeBig("1152921504606846976 GB").magnitude // 1152921504606846976000000000n
 * parseSizeBig("1.5 KiB", "iec", false, "floor").magnitude // 1536n
 * ```
 */
export const parseSizeBig = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
  rounding: RoundingMode = "round",
): BigSizeReading =>
  Either.getOrThrowWith(readSizeBig(input, standard, strictBits, rounding), identity)

/**
 * @since 0.1.0
 * @category Big sizes
 */
export const tryParseSizeBig = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
  rounding: RoundingMode = "round",
): ParseOutcome<BigSizeReading> =>
  Either.match(readSizeBig(input, standard, strictBits, rounding), {
    onLeft: (error) => failedOutcome<BigSizeReading>(input, error),
    onRight: (reading) => ({
      isSuccess: true,
      value: reading,
      originalInput: input,
      normalizedInput: reading.normalizedInput,
      detectedUnitSymbol: reading.detectedUnitSymbol,
      isBitInput: reading.isBitInput,
      rawNumericValue: reading.rawNumericValue,
    }),
  })

/**
 * @since 0.1.0
 * @category Big sizes
 */
export const parseSizeBigEffect = (
  input: string,
  standard: ByteStandard = "si",
  strictBits = false,
  rounding: RoundingMode = "round",
): Effect.Effect<BigSizeReading, ParseError> =>
  Effect.suspend(() => readSizeBig(input, standard, strictBits, rounding))

// -----------------------------------------------------------------------------
// durations
// -----------------------------------------------------------------------------

/**
 * @since 0.1.0
 * @category Durations
 */
export const parseDurationEither = (input: string): Either.Either<DimensionedValue, ParseError> =>
  Either.map(parseDurationLiteral(input), (reading) => reading.value)

/**
 * Parses `number? unit` into seconds (`"250 ms"`, `"1.5 h"`, `"s"`).
 *
 * @since 0.1.0
 * @category Durations
 */
export const parseDuration = (input: string): DimensionedValue =>
  Either.getOrThrowWith(parseDurationEither(input), identity)

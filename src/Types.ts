/**
 * Type foundations shared by every parser.
 *
 * Unit standards and rounding modes are closed literal unions backed by
 * schemas so configuration and external input decode into the same types the
 * parsers accept. `DimensionedValue` is the single currency of the literal
 * parsers and the expression evaluator.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import type { ParseError } from "./Errors.js"

/**
 * Unit standard used to resolve ambiguous symbols.
 *
 * - `si`: decimal multiples (1000ⁿ), symbols KB through QB
 * - `iec`: binary multiples (1024ⁿ), symbols KiB through YiB
 * - `jedec`: binary multiples with decimal symbols, KB through TB only
 *
 * @since 0.1.0
 * @category Standards
 */
export const ByteStandard = Schema.Literal("si", "iec", "jedec")

/**
 * @since 0.1.0
 * @category Standards
 */
export type ByteStandard = typeof ByteStandard.Type

/**
 * Fallback order used when a symbol is not part of the requested standard.
 *
 * @since 0.1.0
 * @category Standards
 */
export const BYTE_STANDARDS: ReadonlyArray<ByteStandard> = ByteStandard.literals

/**
 * Rounding applied when a fractional byte count has to become an integer.
 * `round` resolves ties away from zero.
 *
 * @since 0.1.0
 * @category Rounding
 */
export const RoundingMode = Schema.Literal("floor", "ceil", "round")

/**
 * @since 0.1.0
 * @category Rounding
 */
export type RoundingMode = typeof RoundingMode.Type

/**
 * Magnitude tagged with its physical dimension.
 *
 * A size is `(1, 0)`, a duration `(0, 1)`, a rate `(1, -1)` and a plain
 * number `(0, 0)`. Sizes are in bytes, durations in seconds and rates in
 * bytes per second.
 *
 * @since 0.1.0
 * @category Values
 */
export const DimensionedValue = Schema.Struct({
  magnitude: Schema.Number,
  sizePower: Schema.Int,
  timePower: Schema.Int,
})

/**
 * @since 0.1.0
 * @category Values
 */
export type DimensionedValue = typeof DimensionedValue.Type

/**
 * Arbitrary-precision size produced by `parseSizeBig`.
 *
 * @since 0.1.0
 * @category Values
 */
export interface BigSizeReading {
  readonly magnitude: bigint
  /** `true` when the integer-only path produced the value. */
  readonly exact: boolean
  readonly normalizedInput: string
  readonly detectedUnitSymbol: string
  readonly isBitInput: boolean
  readonly rawNumericValue: number
}

/**
 * Result of a non-throwing parse. Failures keep whatever context was computed
 * before the error.
 *
 * @since 0.1.0
 * @category Results
 */
export interface ParseOutcome<T> {
  readonly isSuccess: boolean
  readonly value?: T
  readonly originalInput: string
  readonly normalizedInput?: string
  readonly detectedUnitSymbol?: string
  readonly isBitInput: boolean
  readonly rawNumericValue?: number
  readonly error?: ParseError
}

/**
 * Parse error hierarchy.
 *
 * Every failure the engine can report is a tagged error so callers can
 * pattern match with `Effect.catchTag`. Each carries the full input it was
 * raised against and, where known, the character offset of the offending
 * text within that input.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Input does not have the shape of a literal or expression.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MalformedLiteralError extends Data.TaggedError("MalformedLiteralError")<{
  readonly input: string
  readonly problem: string
  readonly position?: number
}> {
  override get message(): string {
    return this.problem
  }
}

/**
 * Unit token does not resolve under the requested standard.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new UnknownUnitError({ input: "1 XB", unit: "XB", position: 2 })
 * error.message // "Unknown unit: XB"
 * ```
 */
export class UnknownUnitError extends Data.TaggedError("UnknownUnitError")<{
  readonly input: string
  readonly unit: string
  readonly position?: number
}> {
  override get message(): string {
    return `Unknown unit: ${this.unit}`
  }
}

/**
 * Rate unit token does not resolve under the requested standard.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownRateUnitError extends Data.TaggedError("UnknownRateUnitError")<{
  readonly input: string
  readonly unit: string
  readonly position?: number
}> {
  override get message(): string {
    return `Unknown rate unit: ${this.unit}`
  }
}

/**
 * Duration unit token is not a known time unit. Kept apart from
 * `UnknownUnitError` so expression diagnostics can name the sub-grammar that
 * failed.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownDurationUnitError extends Data.TaggedError("UnknownDurationUnitError")<{
  readonly input: string
  readonly unit: string
  readonly position?: number
}> {
  override get message(): string {
    return `Unknown duration unit: ${this.unit}`
  }
}

/**
 * Addition or subtraction across different dimensions (a size plus a
 * duration, for instance).
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncompatibleUnitsError extends Data.TaggedError("IncompatibleUnitsError")<{
  readonly input: string
  readonly operation: "add" | "subtract"
  readonly position?: number
}> {
  override get message(): string {
    return `Cannot ${this.operation} values with incompatible units`
  }
}

/**
 * A complete expression does not carry the dimension the caller asked for.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly input: string
  readonly expected: "size" | "rate"
  readonly sizePower: number
  readonly timePower: number
}> {
  override get message(): string {
    return this.expected === "size"
      ? "Expression does not resolve to a byte size"
      : "Expression does not resolve to a data rate"
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly input: string
  readonly position?: number
}> {
  override get message(): string {
    return "Division by zero in expression"
  }
}

/**
 * An arithmetic step or literal produced NaN or an infinity.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonFiniteResultError extends Data.TaggedError("NonFiniteResultError")<{
  readonly input: string
  readonly position?: number
}> {
  override get message(): string {
    return "Expression produced a non-finite result"
  }
}

/**
 * Strict-bit mode rejected a non-integral bit quantity.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FractionalBitsError extends Data.TaggedError("FractionalBitsError")<{
  readonly input: string
  readonly value: number
  readonly position?: number
}> {
  override get message(): string {
    return "Fractional bits not allowed"
  }
}

/**
 * Sizes and rates cannot be negative.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NegativeMagnitudeError extends Data.TaggedError("NegativeMagnitudeError")<{
  readonly input: string
  readonly quantity: "size" | "rate"
  readonly magnitude: number
}> {
  override get message(): string {
    return this.quantity === "size" ? "Bytes cannot be negative" : "Rate cannot be negative"
  }
}

/**
 * Union of every parse failure.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ParseError =
  | MalformedLiteralError
  | UnknownUnitError
  | UnknownRateUnitError
  | UnknownDurationUnitError
  | IncompatibleUnitsError
  | DimensionMismatchError
  | DivisionByZeroError
  | NonFiniteResultError
  | FractionalBitsError
  | NegativeMagnitudeError

/**
 * Offset of the failure within `input`, when the error carries one.
 *
 * @category Errors
 * @since 0.1.0
 */
export const errorPosition = (error: ParseError): number | undefined =>
  "position" in error ? error.position : undefined

/**
 * @category Errors
 * @since 0.1.0
 */
export const isParseError = (value: unknown): value is ParseError =>
  value instanceof MalformedLiteralError ||
  value instanceof UnknownUnitError ||
  value instanceof UnknownRateUnitError ||
  value instanceof UnknownDurationUnitError ||
  value instanceof IncompatibleUnitsError ||
  value instanceof DimensionMismatchError ||
  value instanceof DivisionByZeroError ||
  value instanceof NonFiniteResultError ||
  value instanceof FractionalBitsError ||
  value instanceof NegativeMagnitudeError

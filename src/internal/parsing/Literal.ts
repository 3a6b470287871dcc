import { Either } from "effect"
import { FractionalBitsError, NonFiniteResultError } from "../../Errors.js"
import type { DimensionedValue } from "../../Types.js"
import type { UnitEntry } from "../../Units.js"

/**
 * Where a literal sits: the whole input errors are reported against and the
 * literal's offset within it.
 */
export interface Origin {
  readonly input: string
  readonly offset: number
}

export const standalone = (text: string): Origin => ({ input: text, offset: 0 })

export interface LiteralReading {
  readonly value: DimensionedValue
  readonly normalizedInput: string
  readonly detectedUnitSymbol: string
  readonly isBitInput: boolean
  readonly rawNumericValue: number
  /** Resolved byte or bit unit; absent for durations. */
  readonly unit?: UnitEntry
}

/**
 * Leading numeral of a literal: optional sign, then digits, separators and
 * grouping with at least one digit. It absorbs the whitespace before a unit
 * and holds no letters.
 */
export const NUMERAL = String.raw`[+-]?(?=[\d.,_\s]*\d)[\d.,_\s]+`

export const positionOf = (origin: Origin, text: string, fragment: string): number => {
  const at = text.lastIndexOf(fragment)
  return origin.offset + (at < 0 ? 0 : at)
}

export const checkStrictBits = (
  origin: Origin,
  unit: UnitEntry,
  numeral: number,
  strictBits: boolean,
): Either.Either<void, FractionalBitsError> =>
  strictBits && unit.isBitUnit && !Number.isInteger(numeral)
    ? Either.left(
        new FractionalBitsError({ input: origin.input, value: numeral, position: origin.offset }),
      )
    : Either.right(undefined)

export const ensureFinite = (
  origin: Origin,
  magnitude: number,
): Either.Either<number, NonFiniteResultError> =>
  Number.isFinite(magnitude)
    ? Either.right(magnitude)
    : Either.left(new NonFiniteResultError({ input: origin.input, position: origin.offset }))

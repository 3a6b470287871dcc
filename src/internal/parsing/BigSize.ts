import { Either } from "effect"
import { NegativeMagnitudeError, type ParseError } from "../../Errors.js"
import type { BigSizeReading, ByteStandard, RoundingMode } from "../../Types.js"
import { resolveUnit } from "../../Units.js"
import { normalizeNumeral } from "./Numeral.js"
import { readSize } from "./Readings.js"
import { collapseWhitespace } from "./text.js"

const INTEGER_LITERAL = /^([+-]?\d+)\s*(\p{L}+)?$/u

export const roundBytes = (bytes: number, rounding: RoundingMode): bigint => {
  switch (rounding) {
    case "floor":
      return BigInt(Math.floor(bytes))
    case "ceil":
      return BigInt(Math.ceil(bytes))
    case "round":
      return BigInt(Math.round(bytes))
  }
}

// Integer numerals over a unit with a whole number of bytes never touch a double.
const readExact = (
  input: string,
  standard: ByteStandard,
): Either.Either<BigSizeReading, NegativeMagnitudeError> | undefined => {
  const match = INTEGER_LITERAL.exec(collapseWhitespace(input))
  if (match === null) {
    return undefined
  }
  const unitRaw = match[2]
  const resolved = resolveUnit(unitRaw ?? "B", standard)
  if (Either.isLeft(resolved)) {
    return undefined
  }
  const unit = resolved.right
  const bytesPerUnit = unit.exactMultiplier
  if (bytesPerUnit === undefined) {
    return undefined
  }
  const numeral = normalizeNumeral(match[1] ?? "")
  const count = BigInt(numeral.replace(/^\+/, ""))
  if (count < 0n) {
    return Either.left(
      new NegativeMagnitudeError({ input, quantity: "size", magnitude: Number(numeral) }),
    )
  }
  return Either.right({
    magnitude: count * bytesPerUnit,
    exact: true,
    normalizedInput: unitRaw === undefined ? numeral : `${numeral} ${unit.symbol}`,
    detectedUnitSymbol: unit.symbol,
    isBitInput: unit.isBitUnit,
    rawNumericValue: Number(numeral),
  })
}

/**
 * Byte count as a `bigint`. Falls back to the double-precision size path and
 * rounds when the input is not a plain integer over an integral unit.
 */
export const readSizeBig = (
  input: string,
  standard: ByteStandard,
  strictBits: boolean,
  rounding: RoundingMode,
): Either.Either<BigSizeReading, ParseError> =>
  readExact(input, standard) ??
  Either.map(readSize(input, standard, strictBits), (reading) => ({
    magnitude: roundBytes(reading.value.magnitude, rounding),
    exact: false,
    normalizedInput: reading.normalizedInput,
    detectedUnitSymbol: reading.detectedUnitSymbol,
    isBitInput: reading.isBitInput,
    rawNumericValue: reading.rawNumericValue,
  }))

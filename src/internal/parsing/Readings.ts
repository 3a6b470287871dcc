import { Either } from "effect"
import { NegativeMagnitudeError, type ParseError } from "../../Errors.js"
import { evaluateExpression } from "../../Expressions.js"
import type { ByteStandard } from "../../Types.js"
import type { LiteralReading } from "./Literal.js"
import { parseRateLiteral } from "./RateLiteral.js"
import { parseSizeLiteral } from "./SizeLiteral.js"
import { collapseWhitespace, containsExpressionOperators } from "./text.js"

export type Reading = Omit<LiteralReading, "unit">

const fromExpression = (
  input: string,
  standard: ByteStandard,
  strictBits: boolean,
  expect: "size" | "rate",
): Either.Either<Reading, ParseError> =>
  Either.map(evaluateExpression(input, { standard, strictBits, expect }), (value) => ({
    value,
    normalizedInput: collapseWhitespace(input),
    detectedUnitSymbol: expect === "size" ? "B" : "expression",
    isBitInput: false,
    rawNumericValue: value.magnitude,
  }))

const nonNegative = (
  input: string,
  quantity: "size" | "rate",
  reading: Reading,
): Either.Either<Reading, NegativeMagnitudeError> => {
  const { magnitude } = reading.value
  if (magnitude < 0) {
    return Either.left(new NegativeMagnitudeError({ input, quantity, magnitude }))
  }
  // `-0 GB` comes out as plain zero
  return Either.right({ ...reading, value: { ...reading.value, magnitude: magnitude + 0 } })
}

/**
 * A single literal keeps its detected unit; anything with operators is
 * evaluated as an expression that must come out as bytes.
 */
export const readSize = (
  input: string,
  standard: ByteStandard,
  strictBits: boolean,
): Either.Either<Reading, ParseError> => {
  const reading: Either.Either<Reading, ParseError> = containsExpressionOperators(input)
    ? fromExpression(input, standard, strictBits, "size")
    : parseSizeLiteral(input, { standard, strictBits })
  return Either.flatMap(reading, (value) => nonNegative(input, "size", value))
}

export const readRate = (
  input: string,
  standard: ByteStandard,
  strictBits: boolean,
): Either.Either<Reading, ParseError> => {
  const reading: Either.Either<Reading, ParseError> = containsExpressionOperators(input)
    ? fromExpression(input, standard, strictBits, "rate")
    : parseRateLiteral(input, { standard, strictBits })
  return Either.flatMap(reading, (value) => nonNegative(input, "rate", value))
}

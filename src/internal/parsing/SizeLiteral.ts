import { Either } from "effect"
import {
  MalformedLiteralError,
  UnknownUnitError,
  type FractionalBitsError,
  type NonFiniteResultError,
} from "../../Errors.js"
import type { ByteStandard } from "../../Types.js"
import { resolveUnit } from "../../Units.js"
import { size } from "./Dimension.js"
import {
  checkStrictBits,
  ensureFinite,
  NUMERAL,
  positionOf,
  standalone,
  type LiteralReading,
  type Origin,
} from "./Literal.js"
import { normalizeNumeral } from "./Numeral.js"
import { collapseWhitespace } from "./text.js"

const SIZE_LITERAL = new RegExp(String.raw`^(${NUMERAL})(\p{L}+)?$`, "u")

export interface LiteralOptions {
  readonly standard: ByteStandard
  readonly strictBits: boolean
  readonly origin?: Origin
}

export type SizeLiteralError =
  | MalformedLiteralError
  | UnknownUnitError
  | FractionalBitsError
  | NonFiniteResultError

/**
 * Parses `number unit?` into bytes. A bare number is a byte count.
 */
export const parseSizeLiteral = (
  text: string,
  options: LiteralOptions,
): Either.Either<LiteralReading, SizeLiteralError> => {
  const origin = options.origin ?? standalone(text)
  const match = SIZE_LITERAL.exec(collapseWhitespace(text))
  if (match === null) {
    return Either.left(
      new MalformedLiteralError({
        input: origin.input,
        problem: `Invalid size format: ${text}`,
        position: origin.offset,
      }),
    )
  }
  const numeral = normalizeNumeral(match[1] ?? "")
  const unitRaw = match[2]
  const raw = Number(numeral)

  return Either.gen(function* () {
    const unit = yield* Either.mapLeft(
      resolveUnit(unitRaw ?? "B", options.standard),
      () =>
        new UnknownUnitError({
          input: origin.input,
          unit: unitRaw ?? "B",
          position: positionOf(origin, text, unitRaw ?? ""),
        }),
    )
    yield* checkStrictBits(origin, unit, raw, options.strictBits)
    const bytes = yield* ensureFinite(origin, raw * unit.multiplier)
    return {
      value: size(bytes),
      normalizedInput: unitRaw === undefined ? numeral : `${numeral} ${unit.symbol}`,
      detectedUnitSymbol: unit.symbol,
      isBitInput: unit.isBitUnit,
      rawNumericValue: raw,
      unit,
    }
  })
}

import { Either } from "effect"
import {
  MalformedLiteralError,
  UnknownRateUnitError,
  type FractionalBitsError,
  type NonFiniteResultError,
} from "../../Errors.js"
import { resolveUnit } from "../../Units.js"
import { rate } from "./Dimension.js"
import {
  checkStrictBits,
  ensureFinite,
  NUMERAL,
  positionOf,
  standalone,
  type LiteralReading,
} from "./Literal.js"
import { normalizeNumeral } from "./Numeral.js"
import type { LiteralOptions } from "./SizeLiteral.js"
import { symbolForWord } from "./UnitWords.js"
import { collapseWhitespace } from "./text.js"

const RATE_LITERAL = new RegExp(String.raw`^(${NUMERAL})(\S.*)?$`, "u")

const PER_SECOND = /^(.+?)\s*(?:\/\s*(?:second|sec|s)|\bper\s+(?:second|sec|s)|ps)$/i

const SPELLED_BIT = /^(.*?)bits?$/i

const RATE_HINT = /(?:\/s|\/sec|\/second|\bper\b|bps|ps)/i

const DIGIT = /\d/

export const looksLikeRate = (text: string): boolean => RATE_HINT.test(text) && DIGIT.test(text)

export type RateLiteralError =
  | MalformedLiteralError
  | UnknownRateUnitError
  | FractionalBitsError
  | NonFiniteResultError

// `Mbit` and `kbits` spell the bit suffix out.
const unitToken = (stripped: string): string => {
  if (symbolForWord(stripped) !== undefined) {
    return stripped
  }
  const spelled = SPELLED_BIT.exec(stripped)
  return spelled === null ? stripped : `${spelled[1] ?? ""}b`
}

/**
 * Parses `number unit per-second` into bytes per second. The unit is
 * required and resolves like a size unit.
 */
export const parseRateLiteral = (
  text: string,
  options: LiteralOptions,
): Either.Either<LiteralReading, RateLiteralError> => {
  const origin = options.origin ?? standalone(text)
  const match = RATE_LITERAL.exec(collapseWhitespace(text))
  if (match === null || match[2] === undefined) {
    return Either.left(
      new MalformedLiteralError({
        input: origin.input,
        problem: `Invalid rate format: ${text}`,
        position: origin.offset,
      }),
    )
  }
  const numeral = normalizeNumeral(match[1] ?? "")
  const unitRaw = match[2]
  const raw = Number(numeral)
  const unknown = () =>
    new UnknownRateUnitError({
      input: origin.input,
      unit: unitRaw,
      position: positionOf(origin, text, unitRaw.split(" ")[0] ?? unitRaw),
    })

  const perSecond = PER_SECOND.exec(unitRaw)
  if (perSecond === null) {
    return Either.left(unknown())
  }

  return Either.gen(function* () {
    const unit = yield* Either.mapLeft(
      resolveUnit(unitToken(perSecond[1] ?? ""), options.standard),
      unknown,
    )
    yield* checkStrictBits(origin, unit, raw, options.strictBits)
    const bytesPerSecond = yield* ensureFinite(origin, raw * unit.multiplier)
    return {
      value: rate(bytesPerSecond),
      normalizedInput: `${numeral} ${unit.symbol}/s`,
      detectedUnitSymbol: unit.symbol,
      isBitInput: unit.isBitUnit,
      rawNumericValue: raw,
      unit,
    }
  })
}

import { Either } from "effect"
import { MalformedLiteralError, NonFiniteResultError, type ParseError } from "../../Errors.js"
import type { ByteStandard, DimensionedValue } from "../../Types.js"
import { isKnownUnit } from "../../Units.js"
import { scalar, size } from "./Dimension.js"
import { looksLikeDuration, parseDurationLiteral } from "./DurationLiteral.js"
import type { LiteralResolver } from "./Evaluator.js"
import { NUMERAL, type Origin } from "./Literal.js"
import { normalizeNumeral, parseNumeral } from "./Numeral.js"
import { looksLikeRate, parseRateLiteral } from "./RateLiteral.js"
import { parseSizeLiteral } from "./SizeLiteral.js"
import { hasLetter } from "./text.js"
import type { Token } from "./Tokenizer.js"

export interface ResolverOptions {
  readonly source: string
  readonly standard: ByteStandard
  readonly strictBits: boolean
  /** Read `<n> MB` as n/1024 of a decimal gigabyte. */
  readonly megabyteAsGigabyteFraction: boolean
}

const DIGIT = /\d/
const MEGABYTE_LITERAL = new RegExp(String.raw`^(${NUMERAL})MB$`)
const MEGABYTE_SYMBOL = /\bMB\b/
const GIGABYTE_SYMBOL = /\bGB\b/

/**
 * `true` for size expressions under `si` that write both `MB` and `GB`, where
 * `1 GB + 512 MB` is meant as one and a half gigabytes.
 */
export const mixesMegabytesAndGigabytes = (source: string, standard: ByteStandard): boolean =>
  standard === "si" && MEGABYTE_SYMBOL.test(source) && GIGABYTE_SYMBOL.test(source)

const megabyteFraction = (text: string): DimensionedValue | undefined => {
  const match = MEGABYTE_LITERAL.exec(text)
  return match === null ? undefined : size((Number(normalizeNumeral(match[1] ?? "")) / 1024) * 1e9)
}

const resolveNumber = (origin: Origin, text: string): Either.Either<DimensionedValue, ParseError> => {
  if (!DIGIT.test(text)) {
    return Either.left(
      new MalformedLiteralError({
        input: origin.input,
        problem: `Invalid numeric literal: ${text}`,
        position: origin.offset,
      }),
    )
  }
  const value = parseNumeral(text)
  return Number.isFinite(value)
    ? Either.right(scalar(value))
    : Either.left(new NonFiniteResultError({ input: origin.input, position: origin.offset }))
}

/**
 * Classifies each literal token as a number, rate, duration or size and
 * parses it. Errors are positioned within the whole source.
 */
export const makeLiteralResolver = (options: ResolverOptions): LiteralResolver => (token: Token) => {
  const text = token.lexeme.trim()
  const origin: Origin = { input: options.source, offset: token.startOffset }
  const literalOptions = { standard: options.standard, strictBits: options.strictBits, origin }

  if (!hasLetter(text)) {
    return resolveNumber(origin, text)
  }
  if (looksLikeRate(text)) {
    return Either.map(parseRateLiteral(text, literalOptions), (reading) => reading.value)
  }
  const asDuration = looksLikeDuration(text) ? parseDurationLiteral(text, origin) : undefined
  if (asDuration !== undefined && Either.isRight(asDuration)) {
    return Either.right(asDuration.right.value)
  }
  if (options.megabyteAsGigabyteFraction) {
    const shimmed = megabyteFraction(text)
    if (shimmed !== undefined) {
      return Either.right(shimmed)
    }
  }

  const asSize = parseSizeLiteral(text, literalOptions)
  if (Either.isRight(asSize)) {
    return Either.right(asSize.right.value)
  }
  // Fractional bits and overflow are final; a shape or unit failure may be a duration.
  const sizeError = asSize.left
  if (sizeError._tag !== "MalformedLiteralError" && sizeError._tag !== "UnknownUnitError") {
    return Either.left(sizeError)
  }
  // A unit the standard rejects is still a size unit.
  if (sizeError._tag === "UnknownUnitError" && isKnownUnit(sizeError.unit)) {
    return Either.left(sizeError)
  }
  const retry = asDuration ?? parseDurationLiteral(text, origin)
  if (Either.isLeft(retry) && retry.left._tag === "UnknownDurationUnitError") {
    return Either.left(retry.left)
  }
  return Either.left(sizeError)
}

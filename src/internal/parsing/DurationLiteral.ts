import { Either } from "effect"
import {
  MalformedLiteralError,
  UnknownDurationUnitError,
  type NonFiniteResultError,
} from "../../Errors.js"
import { duration } from "./Dimension.js"
import {
  ensureFinite,
  NUMERAL,
  positionOf,
  standalone,
  type LiteralReading,
  type Origin,
} from "./Literal.js"
import { normalizeNumeral } from "./Numeral.js"
import { collapseWhitespace } from "./text.js"

const SECONDS_PER_UNIT: ReadonlyMap<string, number> = new Map([
  ["ns", 1e-9],
  ["nanosecond", 1e-9],
  ["nanoseconds", 1e-9],
  ["us", 1e-6],
  ["µs", 1e-6],
  ["microsecond", 1e-6],
  ["microseconds", 1e-6],
  ["ms", 1e-3],
  ["millisecond", 1e-3],
  ["milliseconds", 1e-3],
  ["s", 1],
  ["sec", 1],
  ["secs", 1],
  ["second", 1],
  ["seconds", 1],
  ["m", 60],
  ["min", 60],
  ["mins", 60],
  ["minute", 60],
  ["minutes", 60],
  ["h", 3600],
  ["hr", 3600],
  ["hrs", 3600],
  ["hour", 3600],
  ["hours", 3600],
  ["d", 86400],
  ["day", 86400],
  ["days", 86400],
])

const DURATION_LITERAL = new RegExp(String.raw`^(${NUMERAL})?([a-zµ]+)$`, "i")

const DURATION_HINT =
  /(?:ns|nano(?:second)?s?|us|µs|μs|micro(?:second)?s?|ms|milliseconds?|s|sec|secs|seconds?|m|min|mins|minutes?|h|hr|hrs|hours?|d|day|days)\s*$/i

// Greek mu and the micro sign are both accepted.
const GREEK_MU = /μ/g

export const looksLikeDuration = (text: string): boolean => DURATION_HINT.test(text.trim())

/**
 * Parses `number? unit` into seconds. The number defaults to 1, so a bare
 * `s` is one second.
 */
export const parseDurationLiteral = (
  text: string,
  origin: Origin = standalone(text),
): Either.Either<
  LiteralReading,
  MalformedLiteralError | UnknownDurationUnitError | NonFiniteResultError
> => {
  const match = DURATION_LITERAL.exec(collapseWhitespace(text).replace(GREEK_MU, "µ"))
  if (match === null) {
    return Either.left(
      new MalformedLiteralError({
        input: origin.input,
        problem: `Invalid duration literal: ${text}`,
        position: origin.offset,
      }),
    )
  }
  const numeralRaw = match[1]
  const unitRaw = match[2] ?? ""
  const unit = unitRaw.toLowerCase()
  const factor = SECONDS_PER_UNIT.get(unit)
  if (factor === undefined) {
    return Either.left(
      new UnknownDurationUnitError({
        input: origin.input,
        unit,
        position: positionOf(origin, text, unitRaw),
      }),
    )
  }
  const numeral = numeralRaw === undefined ? "1" : normalizeNumeral(numeralRaw)
  const count = Number(numeral)
  return Either.map(ensureFinite(origin, count * factor), (seconds) => ({
    value: duration(seconds),
    normalizedInput: `${numeral} ${unit}`,
    detectedUnitSymbol: unit,
    isBitInput: false,
    rawNumericValue: count,
  }))
}

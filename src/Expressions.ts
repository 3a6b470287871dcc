/**
 * Arithmetic over size, duration and rate literals.
 *
 * ```
 * expression := term (('+' | '-') term)*
 * term       := factor (('*' | '/') factor)*
 * factor     := ('+' | '-') factor | '(' expression ')' | literal
 * ```
 *
 * Sums need equal dimensions, products add them and quotients subtract them,
 * so `2 GiB / 5 s` is a rate and `10 MB/s * 1 min` is a size.
 *
 * @since 0.1.0
 */

import { Either } from "effect"
import { DimensionMismatchError, type ParseError } from "./Errors.js"
import { isRate, isSize } from "./internal/parsing/Dimension.js"
import { evaluateTokens } from "./internal/parsing/Evaluator.js"
import { makeLiteralResolver, mixesMegabytesAndGigabytes } from "./internal/parsing/LiteralResolver.js"
import { tokenize } from "./internal/parsing/Tokenizer.js"
import type { ByteStandard, DimensionedValue } from "./Types.js"

/**
 * Splits an expression into literal and operator tokens, closed by `EOF`.
 * Offsets point into the input as given.
 *
 * @since 0.1.0
 * @category Tokens
 */
export { tokenize }

/**
 * @since 0.1.0
 * @category Tokens
 */
export type { Token, TokenKind } from "./internal/parsing/Tokenizer.js"

/**
 * @since 0.1.0
 * @category Tokens
 */
export { containsExpressionOperators } from "./internal/parsing/text.js"

/**
 * @since 0.1.0
 * @category Evaluation
 */
export interface EvaluationOptions {
  readonly standard?: ByteStandard
  readonly strictBits?: boolean
  /** Dimension the result must have. Without it any dimension is returned. */
  readonly expect?: "size" | "rate"
}

const hasExpectedDimension = (value: DimensionedValue, expect: "size" | "rate"): boolean =>
  expect === "size" ? isSize(value) : isRate(value)

/**
 * Evaluates an expression to a dimensioned value.
 *
 * @since 0.1.0
 * @category Evaluation
 * @example
 * ```ts
 * evaluateExpression("(1 GiB + 512 MiB) - 256 MB", { expect: "size" })
 * // Right({ magnitude: 1354612736, sizePower: 1, timePower: 0 })
 * ```
 */
export const evaluateExpression = (
  input: string,
  options: EvaluationOptions = {},
): Either.Either<DimensionedValue, ParseError> => {
  const standard = options.standard ?? "si"
  const resolveLiteral = makeLiteralResolver({
    source: input,
    standard,
    strictBits: options.strictBits ?? false,
    megabyteAsGigabyteFraction:
      options.expect === "size" && mixesMegabytesAndGigabytes(input, standard),
  })
  return Either.gen(function* () {
    const tokens = yield* tokenize(input)
    const value = yield* evaluateTokens(input, tokens, resolveLiteral)
    const expected = options.expect
    if (expected !== undefined && !hasExpectedDimension(value, expected)) {
      return yield* Either.left(
        new DimensionMismatchError({
          input,
          expected,
          sizePower: value.sizePower,
          timePower: value.timePower,
        }),
      )
    }
    return value
  })
}

import { Either } from "effect"
import {
  DivisionByZeroError,
  IncompatibleUnitsError,
  MalformedLiteralError,
  NonFiniteResultError,
  type ParseError,
} from "../../Errors.js"
import type { DimensionedValue } from "../../Types.js"
import { add, divide, equalDimensions, multiply, negate, subtract } from "./Dimension.js"
import type { Token, TokenKind } from "./Tokenizer.js"

export type LiteralResolver = (token: Token) => Either.Either<DimensionedValue, ParseError>

class TokenStream {
  readonly #tokens: ReadonlyArray<Token>
  readonly #end: Token
  #index = 0

  constructor(tokens: ReadonlyArray<Token>, source: string) {
    this.#tokens = tokens
    this.#end = tokens[tokens.length - 1] ?? { kind: "EOF", lexeme: "", startOffset: source.length }
  }

  peek(): Token {
    return this.#tokens[this.#index] ?? this.#end
  }

  consume(): Token {
    const token = this.peek()
    if (this.#index < this.#tokens.length) {
      this.#index += 1
    }
    return token
  }

  match(kind: TokenKind): Token | undefined {
    return this.peek().kind === kind ? this.consume() : undefined
  }
}

interface Evaluation {
  readonly source: string
  readonly stream: TokenStream
  readonly resolveLiteral: LiteralResolver
}

const unexpected = (evaluation: Evaluation, problem: string) =>
  new MalformedLiteralError({
    input: evaluation.source,
    problem,
    position: evaluation.stream.peek().startOffset,
  })

const finiteAt = (
  evaluation: Evaluation,
  operator: Token,
  value: DimensionedValue,
): Either.Either<DimensionedValue, NonFiniteResultError> =>
  Number.isFinite(value.magnitude)
    ? Either.right(value)
    : Either.left(
        new NonFiniteResultError({ input: evaluation.source, position: operator.startOffset }),
      )

const combineAdditive = (
  evaluation: Evaluation,
  operator: Token,
  left: DimensionedValue,
  right: DimensionedValue,
): Either.Either<DimensionedValue, ParseError> => {
  const operation = operator.kind === "Plus" ? "add" : "subtract"
  if (!equalDimensions(left, right)) {
    return Either.left(
      new IncompatibleUnitsError({
        input: evaluation.source,
        operation,
        position: operator.startOffset,
      }),
    )
  }
  return finiteAt(evaluation, operator, operation === "add" ? add(left, right) : subtract(left, right))
}

const combineMultiplicative = (
  evaluation: Evaluation,
  operator: Token,
  left: DimensionedValue,
  right: DimensionedValue,
): Either.Either<DimensionedValue, ParseError> => {
  if (operator.kind === "Star") {
    return finiteAt(evaluation, operator, multiply(left, right))
  }
  if (right.magnitude === 0) {
    return Either.left(
      new DivisionByZeroError({ input: evaluation.source, position: operator.startOffset }),
    )
  }
  return finiteAt(evaluation, operator, divide(left, right))
}

// expression := term (('+' | '-') term)*
const expression = (evaluation: Evaluation): Either.Either<DimensionedValue, ParseError> =>
  Either.gen(function* () {
    let value = yield* term(evaluation)
    let operator = evaluation.stream.match("Plus") ?? evaluation.stream.match("Minus")
    while (operator !== undefined) {
      const right = yield* term(evaluation)
      value = yield* combineAdditive(evaluation, operator, value, right)
      operator = evaluation.stream.match("Plus") ?? evaluation.stream.match("Minus")
    }
    return value
  })

// term := factor (('*' | '/') factor)*
const term = (evaluation: Evaluation): Either.Either<DimensionedValue, ParseError> =>
  Either.gen(function* () {
    let value = yield* factor(evaluation)
    let operator = evaluation.stream.match("Star") ?? evaluation.stream.match("Slash")
    while (operator !== undefined) {
      const right = yield* factor(evaluation)
      value = yield* combineMultiplicative(evaluation, operator, value, right)
      operator = evaluation.stream.match("Star") ?? evaluation.stream.match("Slash")
    }
    return value
  })

// factor := ('+' | '-') factor | '(' expression ')' | literal
const factor = (evaluation: Evaluation): Either.Either<DimensionedValue, ParseError> => {
  const { stream } = evaluation
  if (stream.match("Plus") !== undefined) {
    return factor(evaluation)
  }
  if (stream.match("Minus") !== undefined) {
    return Either.map(factor(evaluation), negate)
  }
  if (stream.match("LParen") !== undefined) {
    return Either.flatMap(
      expression(evaluation),
      (inner): Either.Either<DimensionedValue, MalformedLiteralError> =>
        stream.match("RParen") === undefined
          ? Either.left(unexpected(evaluation, "Missing closing parenthesis"))
          : Either.right(inner),
    )
  }
  const literal = stream.match("Literal")
  if (literal !== undefined) {
    return evaluation.resolveLiteral(literal)
  }
  return Either.left(unexpected(evaluation, "Unexpected token in expression"))
}

/**
 * Evaluates a token stream by recursive descent, combining literal values
 * with dimensional checking. The stream must end in `EOF`.
 */
export const evaluateTokens = (
  source: string,
  tokens: ReadonlyArray<Token>,
  resolveLiteral: LiteralResolver,
): Either.Either<DimensionedValue, ParseError> => {
  const evaluation: Evaluation = {
    source,
    stream: new TokenStream(tokens, source),
    resolveLiteral,
  }
  return Either.flatMap(
    expression(evaluation),
    (value): Either.Either<DimensionedValue, MalformedLiteralError> =>
      evaluation.stream.peek().kind === "EOF"
        ? Either.right(value)
        : Either.left(unexpected(evaluation, "Unexpected trailing tokens")),
  )
}

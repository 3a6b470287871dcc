import { Either } from "effect"
import type { TokenType } from "chevrotain"
import { MalformedLiteralError } from "../../Errors.js"
import { ExpressionLexer, Literal, LParen, Minus, Plus, RParen, Slash, Star } from "./tokens.js"

export type TokenKind = "Literal" | "Plus" | "Minus" | "Star" | "Slash" | "LParen" | "RParen" | "EOF"

export interface Token {
  readonly kind: TokenKind
  readonly lexeme: string
  readonly startOffset: number
}

const KINDS = new Map<TokenType, TokenKind>([
  [Literal, "Literal"],
  [Plus, "Plus"],
  [Minus, "Minus"],
  [Star, "Star"],
  [Slash, "Slash"],
  [LParen, "LParen"],
  [RParen, "RParen"],
])

export const tokenize = (input: string): Either.Either<ReadonlyArray<Token>, MalformedLiteralError> => {
  const result = ExpressionLexer.tokenize(input)
  const [lexError] = result.errors
  if (lexError !== undefined) {
    return Either.left(
      new MalformedLiteralError({ input, problem: lexError.message, position: lexError.offset }),
    )
  }
  const tokens: Array<Token> = []
  for (const token of result.tokens) {
    const kind = KINDS.get(token.tokenType)
    if (kind !== undefined) {
      tokens.push({ kind, lexeme: token.image, startOffset: token.startOffset })
    }
  }
  tokens.push({ kind: "EOF", lexeme: "", startOffset: input.length })
  return Either.right(tokens)
}

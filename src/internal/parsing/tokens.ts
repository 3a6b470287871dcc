import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for size and rate expressions. Operators and parentheses
 * are single characters; everything between them, internal spaces included,
 * is one literal so `1.5 GB` reaches the literal parsers whole.
 */
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
})

export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })

export const Literal = createToken({
  name: "Literal",
  pattern: /[^\s+\-*/()]+(?:\s+[^\s+\-*/()]+)*/,
  line_breaks: true,
})

export const allTokens = [WhiteSpace, Plus, Minus, Star, Slash, LParen, RParen, Literal]

export const ExpressionLexer = new Lexer(allTokens, {
  positionTracking: "onlyOffset",
  safeMode: true,
})

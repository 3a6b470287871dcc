import { describe, it, expect } from "@effect/vitest"
import { Either } from "effect"
import { errorPosition } from "../src/Errors.js"
import { containsExpressionOperators, evaluateExpression, tokenize } from "../src/Expressions.js"

describe("tokenize", () => {
  it("keeps literals whole and records offsets", () => {
    const tokens = Either.getOrThrow(tokenize("2 GiB/5s + 50 Mbps"))

    expect(tokens.map((token) => token.kind)).toEqual([
      "Literal",
      "Slash",
      "Literal",
      "Plus",
      "Literal",
      "EOF",
    ])
    expect(tokens.map((token) => token.lexeme)).toEqual(["2 GiB", "/", "5s", "+", "50 Mbps", ""])
    expect(tokens.map((token) => token.startOffset)).toEqual([0, 5, 6, 9, 11, 18])
  })

  it("skips leading whitespace", () => {
    const tokens = Either.getOrThrow(tokenize("  (1 MB)"))

    expect(tokens.map((token) => [token.kind, token.startOffset])).toEqual([
      ["LParen", 2],
      ["Literal", 3],
      ["RParen", 7],
      ["EOF", 8],
    ])
  })
})

describe("containsExpressionOperators", () => {
  it("treats per-second slashes as part of a rate", () => {
    expect(containsExpressionOperators("10 MB/s")).toBe(false)
    expect(containsExpressionOperators("10 MB / sec")).toBe(false)
    expect(containsExpressionOperators("1 MB/second")).toBe(false)
    expect(containsExpressionOperators("1 MB/min")).toBe(true)
  })

  it("treats a leading minus as a sign", () => {
    expect(containsExpressionOperators("-5 KB")).toBe(false)
    expect(containsExpressionOperators("5 - 3")).toBe(true)
    expect(containsExpressionOperators("10 MB/s - 1 MB/s")).toBe(true)
  })

  it("flags parentheses and other operators", () => {
    expect(containsExpressionOperators("(1 MB)")).toBe(true)
    expect(containsExpressionOperators("2 * 3")).toBe(true)
    expect(containsExpressionOperators("1.5 GB")).toBe(false)
  })
})

describe("evaluateExpression", () => {
  it("multiplies plain numbers", () => {
    expect(Either.getOrThrow(evaluateExpression("2 * 3"))).toEqual(
      { magnitude: 6, sizePower: 0, timePower: 0 },
    )
  })

  it("tracks dimensions through products and quotients", () => {
    expect(Either.getOrThrow(evaluateExpression("1 GB * 1 GB"))).toEqual(
      { magnitude: 1e18, sizePower: 2, timePower: 0 },
    )
    expect(Either.getOrThrow(evaluateExpression("2 GiB / 4 GiB"))).toEqual(
      { magnitude: 0.5, sizePower: 0, timePower: 0 },
    )
    expect(Either.getOrThrow(evaluateExpression("10 MB/s * 1 min", { expect: "size" }))).toEqual(
      { magnitude: 6e8, sizePower: 1, timePower: 0 },
    )
  })

  it("applies unary minus to a parenthesized group", () => {
    expect(Either.getOrThrow(evaluateExpression("-(1 GB) + 2 GB", { expect: "size" }))).toEqual(
      { magnitude: 1e9, sizePower: 1, timePower: 0 },
    )
  })

  it("reports the dimension that came out", () => {
    const result = evaluateExpression("1 GB", { expect: "rate" })
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("DimensionMismatchError")
      expect(result.left.message).toBe("Expression does not resolve to a data rate")
    }
  })

  it("keeps a rejected unit an unknown unit rather than a duration", () => {
    const rejected = evaluateExpression("2 KiB * 2", { standard: "jedec" })
    expect(Either.isLeft(rejected)).toBe(true)
    if (Either.isLeft(rejected)) {
      expect(rejected.left._tag).toBe("UnknownUnitError")
      expect(rejected.left.message).toBe("Unknown unit: KiB")
      expect(errorPosition(rejected.left)).toBe(2)
    }

    const notAUnit = evaluateExpression("1 GB / 1 fortnight")
    expect(Either.isLeft(notAUnit)).toBe(true)
    if (Either.isLeft(notAUnit)) {
      expect(notAUnit.left._tag).toBe("UnknownDurationUnitError")
    }
  })

  it("positions overflow at the operator", () => {
    const huge = "9".repeat(200)
    const result = evaluateExpression(`${huge} * ${huge}`)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("NonFiniteResultError")
      expect(errorPosition(result.left)).toBe(201)
    }
  })

  it("rejects an empty group", () => {
    const result = evaluateExpression("()")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Unexpected token in expression")
    }
  })
})

import { describe, it, expect } from "vitest"
import { Either } from "effect"
import { looksLikeDuration, parseDurationLiteral } from "../../src/internal/parsing/DurationLiteral.js"
import { looksLikeRate, parseRateLiteral } from "../../src/internal/parsing/RateLiteral.js"
import { parseSizeLiteral } from "../../src/internal/parsing/SizeLiteral.js"

const si = { standard: "si", strictBits: false } as const

describe("size literals", () => {
  it("reads a number with a unit", () => {
    const reading = Either.getOrThrow(parseSizeLiteral("1.5 GB", si))
    expect(reading.value).toEqual({ magnitude: 1.5e9, sizePower: 1, timePower: 0 })
    expect(reading.normalizedInput).toBe("1.5 GB")
    expect(reading.detectedUnitSymbol).toBe("GB")
    expect(reading.rawNumericValue).toBe(1.5)
    expect(reading.unit?.standard).toBe("si")
  })

  it("reads a bare number as bytes", () => {
    const reading = Either.getOrThrow(parseSizeLiteral("4096", si))
    expect(reading.value.magnitude).toBe(4096)
    expect(reading.normalizedInput).toBe("4096")
    expect(reading.detectedUnitSymbol).toBe("B")
  })

  it("positions an unknown unit at the unit", () => {
    const result = parseSizeLiteral("12 XB", si)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("UnknownUnitError")
      expect(result.left.position).toBe(3)
    }
  })

  it("offsets positions by the literal's origin", () => {
    const result = parseSizeLiteral("2 ZZ", { ...si, origin: { input: "1 GB + 2 ZZ", offset: 7 } })
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.input).toBe("1 GB + 2 ZZ")
      expect(result.left.position).toBe(9)
    }
  })

  it("requires a numeral", () => {
    const result = parseSizeLiteral("GB", si)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Invalid size format: GB")
    }
  })

  it("rejects fractional bits in strict mode", () => {
    const result = parseSizeLiteral("0.5 kb", { standard: "si", strictBits: true })
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("FractionalBitsError")
    }
  })
})

describe("rate literals", () => {
  it("accepts the spelled-out per-second suffix", () => {
    const reading = Either.getOrThrow(parseRateLiteral("10 MB per sec", si))
    expect(reading.value).toEqual({ magnitude: 1e7, sizePower: 1, timePower: -1 })
    expect(reading.normalizedInput).toBe("10 MB/s")
  })

  it("accepts a spelled-out bit suffix", () => {
    const reading = Either.getOrThrow(parseRateLiteral("5 kbit/s", si))
    expect(reading.value.magnitude).toBe(625)
    expect(reading.detectedUnitSymbol).toBe("Kb")
    expect(reading.isBitInput).toBe(true)
  })

  it("reports rates over other time units as unknown", () => {
    const result = parseRateLiteral("3 MB/h", si)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Unknown rate unit: MB/h")
      expect(result.left.position).toBe(2)
    }
  })

  it("recognizes rate-looking text", () => {
    expect(looksLikeRate("10 MB/s")).toBe(true)
    expect(looksLikeRate("100 Mbps")).toBe(true)
    expect(looksLikeRate("Mbps")).toBe(false)
    expect(looksLikeRate("5 GB")).toBe(false)
  })
})

describe("duration literals", () => {
  it("converts to seconds", () => {
    const reading = Either.getOrThrow(parseDurationLiteral("90 min"))
    expect(reading.value).toEqual({ magnitude: 5400, sizePower: 0, timePower: 1 })
    expect(reading.normalizedInput).toBe("90 min")
  })

  it("defaults the count to one", () => {
    const reading = Either.getOrThrow(parseDurationLiteral("Hours"))
    expect(reading.value.magnitude).toBe(3600)
    expect(reading.normalizedInput).toBe("1 hours")
  })

  it("names an unknown unit", () => {
    const result = parseDurationLiteral("2 weeks")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("UnknownDurationUnitError")
      expect(result.left.message).toBe("Unknown duration unit: weeks")
      expect(result.left.position).toBe(2)
    }
  })

  it("rejects text that is not a duration", () => {
    const result = parseDurationLiteral("fast!")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Invalid duration literal: fast!")
    }
  })

  it("recognizes duration-looking text", () => {
    expect(looksLikeDuration("5s")).toBe(true)
    expect(looksLikeDuration("250 ms")).toBe(true)
    expect(looksLikeDuration("5 GB")).toBe(false)
  })
})

import { describe, it, expect } from "@effect/vitest"
import { Either } from "effect"
import { BYTE_STANDARDS } from "../src/Types.js"
import { isKnownUnit, resolveUnit, unitsFor, type UnitEntry } from "../src/Units.js"

const resolved = (token: string, standard: "si" | "iec" | "jedec"): UnitEntry =>
  Either.getOrThrowWith(resolveUnit(token, standard), (error) => error)

describe("unit tables", () => {
  it("resolves every tabled symbol to its own multiplier", () => {
    for (const standard of BYTE_STANDARDS) {
      for (const unit of unitsFor(standard)) {
        expect(resolved(unit.symbol, standard).multiplier).toBe(unit.multiplier)
      }
    }
  })

  it("lists the symbols of each standard", () => {
    expect(unitsFor("si").map((unit) => unit.symbol)).toEqual([
      "B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB", "RB", "QB",
    ])
    expect(unitsFor("iec").map((unit) => unit.symbol)).toEqual([
      "B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB", "ZiB", "YiB",
    ])
    expect(unitsFor("jedec").map((unit) => unit.symbol)).toEqual(["B", "KB", "MB", "GB", "TB"])
  })

  it("carries exact multipliers beyond double precision", () => {
    expect(resolved("QB", "si").exactMultiplier).toBe(10n ** 30n)
    expect(resolved("YiB", "iec").exactMultiplier).toBe(1024n ** 8n)
  })
})

describe("resolveUnit", () => {
  it("falls back to other standards for unambiguous symbols", () => {
    const mebibyte = resolved("MiB", "si")
    expect(mebibyte.multiplier).toBe(1048576)
    expect(mebibyte.standard).toBe("iec")

    const petabyte = resolved("PB", "jedec")
    expect(petabyte.multiplier).toBe(1e15)
    expect(petabyte.standard).toBe("si")
  })

  it("reads decimal symbols as binary under jedec", () => {
    expect(resolved("MB", "jedec").multiplier).toBe(1048576)
    expect(resolved("MB", "si").multiplier).toBe(1e6)
  })

  it("rejects KiB outside iec", () => {
    const result = resolveUnit("KiB", "si")
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("Unknown unit: KiB")
    }
    expect(Either.isLeft(resolveUnit("kibibyte", "jedec"))).toBe(true)
  })

  it("rejects decimal byte symbols under iec", () => {
    expect(Either.isLeft(resolveUnit("KB", "iec"))).toBe(true)
    expect(Either.isLeft(resolveUnit("kilobytes", "iec"))).toBe(true)
  })

  it("derives bit units from byte units", () => {
    const megabit = resolved("Mb", "iec")
    expect(megabit.symbol).toBe("Mb")
    expect(megabit.multiplier).toBe(125000)
    expect(megabit.exactMultiplier).toBe(125000n)
    expect(megabit.standard).toBe("si")
    expect(megabit.isBitUnit).toBe(true)

    const kibibit = resolved("kib", "si")
    expect(kibibit.symbol).toBe("Kib")
    expect(kibibit.multiplier).toBe(128)
  })

  it("has no exact multiplier for a single bit", () => {
    const bit = resolved("b", "si")
    expect(bit.multiplier).toBe(0.125)
    expect(bit.exactMultiplier).toBeUndefined()
  })

  it("resolves spelled-out names", () => {
    expect(resolved("kilooctets", "si").multiplier).toBe(1000)
    expect(resolved("Mégaoctets", "si").multiplier).toBe(1e6)
    expect(resolved("Mebibytes", "si").multiplier).toBe(1048576)

    const gigabits = resolved("gigabits", "jedec")
    expect(gigabits.symbol).toBe("Gb")
    expect(gigabits.multiplier).toBe(1.25e8)
  })

  it("fails on unknown or empty tokens", () => {
    expect(Either.isLeft(resolveUnit("XB", "si"))).toBe(true)
    expect(Either.isLeft(resolveUnit("", "si"))).toBe(true)
    expect(Either.isLeft(resolveUnit("  ", "iec"))).toBe(true)
  })
})

describe("isKnownUnit", () => {
  it("recognizes units some standard rejects", () => {
    expect(isKnownUnit("KB")).toBe(true)
    expect(isKnownUnit("KiB")).toBe(true)
    expect(isKnownUnit("Mb")).toBe(true)
    expect(isKnownUnit("fortnight")).toBe(false)
  })
})

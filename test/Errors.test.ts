import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  DimensionMismatchError,
  DivisionByZeroError,
  errorPosition,
  FractionalBitsError,
  IncompatibleUnitsError,
  isParseError,
  MalformedLiteralError,
  NegativeMagnitudeError,
  UnknownRateUnitError,
  UnknownUnitError,
} from "../src/Errors.js"

describe("parse error hierarchy", () => {
  it("formats messages from their fields", () => {
    expect(new UnknownUnitError({ input: "1 XB", unit: "XB", position: 2 }).message).toBe(
      "Unknown unit: XB",
    )
    expect(new UnknownRateUnitError({ input: "1 MB/h", unit: "MB/h" }).message).toBe(
      "Unknown rate unit: MB/h",
    )
    expect(new IncompatibleUnitsError({ input: "1 GB - 1 s", operation: "subtract" }).message).toBe(
      "Cannot subtract values with incompatible units",
    )
    expect(
      new DimensionMismatchError({ input: "1 GB", expected: "size", sizePower: 0, timePower: 1 })
        .message,
    ).toBe("Expression does not resolve to a byte size")
    expect(new FractionalBitsError({ input: "0.5 b", value: 0.5 }).message).toBe(
      "Fractional bits not allowed",
    )
    expect(new MalformedLiteralError({ input: "", problem: "Invalid size format: " }).message).toBe(
      "Invalid size format: ",
    )
  })

  it("exposes positions where known", () => {
    expect(errorPosition(new DivisionByZeroError({ input: "1 GB / 0", position: 5 }))).toBe(5)
    expect(errorPosition(new UnknownUnitError({ input: "1 XB", unit: "XB" }))).toBeUndefined()
    expect(
      errorPosition(new NegativeMagnitudeError({ input: "-1 B", quantity: "size", magnitude: -1 })),
    ).toBeUndefined()
  })

  it("recognizes its own errors", () => {
    expect(isParseError(new DivisionByZeroError({ input: "1 / 0" }))).toBe(true)
    expect(isParseError(new Error("Division by zero in expression"))).toBe(false)
    expect(isParseError("UnknownUnitError")).toBe(false)
  })

  it.effect("supports catchTag", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(
        new NegativeMagnitudeError({ input: "-2 MB/s", quantity: "rate", magnitude: -2e6 }),
      ).pipe(
        Effect.catchTag("NegativeMagnitudeError", (error) => {
          expect(error.message).toBe("Rate cannot be negative")
          expect(error.magnitude).toBe(-2e6)
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }),
  )
})

import type { DimensionedValue } from "../../Types.js"

export const makeDimensioned = (
  magnitude: number,
  sizePower: number,
  timePower: number,
): DimensionedValue => ({ magnitude, sizePower, timePower })

export const scalar = (magnitude: number): DimensionedValue => makeDimensioned(magnitude, 0, 0)

export const size = (bytes: number): DimensionedValue => makeDimensioned(bytes, 1, 0)

export const duration = (seconds: number): DimensionedValue => makeDimensioned(seconds, 0, 1)

export const rate = (bytesPerSecond: number): DimensionedValue =>
  makeDimensioned(bytesPerSecond, 1, -1)

export const isSize = (value: DimensionedValue): boolean =>
  value.sizePower === 1 && value.timePower === 0

export const isRate = (value: DimensionedValue): boolean =>
  value.sizePower === 1 && value.timePower === -1

export const equalDimensions = (left: DimensionedValue, right: DimensionedValue): boolean =>
  left.sizePower === right.sizePower && left.timePower === right.timePower

export const negate = (value: DimensionedValue): DimensionedValue =>
  makeDimensioned(-value.magnitude, value.sizePower, value.timePower)

// Callers check dimensions before add/subtract.
export const add = (left: DimensionedValue, right: DimensionedValue): DimensionedValue =>
  makeDimensioned(left.magnitude + right.magnitude, left.sizePower, left.timePower)

export const subtract = (left: DimensionedValue, right: DimensionedValue): DimensionedValue =>
  makeDimensioned(left.magnitude - right.magnitude, left.sizePower, left.timePower)

export const multiply = (left: DimensionedValue, right: DimensionedValue): DimensionedValue =>
  makeDimensioned(
    left.magnitude * right.magnitude,
    left.sizePower + right.sizePower,
    left.timePower + right.timePower,
  )

export const divide = (left: DimensionedValue, right: DimensionedValue): DimensionedValue =>
  makeDimensioned(
    left.magnitude / right.magnitude,
    left.sizePower - right.sizePower,
    left.timePower - right.timePower,
  )

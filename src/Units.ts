/**
 * Unit tables for the three byte standards and the symbol resolver.
 *
 * Every table is a read-only module constant keyed by upper-case symbol.
 * `resolveUnit` turns a unit token (a symbol such as `MiB` or `Mb`, or a full
 * name such as `kilobytes` or `kilooctets`) into the entry used to convert a
 * numeral to bytes. Tokens outside the requested standard fall back through
 * the others in `si`, `iec`, `jedec` order, except for two rejections:
 *
 * - the byte symbol `KiB` never resolves under `si` or `jedec`
 * - decimal byte symbols (`KB` through `QB`) never resolve under `iec`
 *
 * Bit units (a trailing lower-case `b`) resolve against `si` and `iec` only.
 *
 * @since 0.1.0
 */

import { Either, Schema } from "effect"
import { UnknownUnitError } from "./Errors.js"
import { symbolForWord } from "./internal/parsing/UnitWords.js"
import { BYTE_STANDARDS, ByteStandard } from "./Types.js"

/**
 * A resolved unit: how many bytes one unit is worth.
 *
 * @since 0.1.0
 * @category Models
 */
export class UnitEntry extends Schema.Class<UnitEntry>("UnitEntry")({
  symbol: Schema.NonEmptyTrimmedString,
  standard: ByteStandard,
  multiplier: Schema.Number.pipe(Schema.greaterThan(0)),
  /** Bytes per unit when that count is a whole number. */
  exactMultiplier: Schema.optional(Schema.BigIntFromSelf),
  isBitUnit: Schema.Boolean,
}) {}

const byteEntry = (symbol: string, standard: ByteStandard, bytes: bigint): UnitEntry =>
  new UnitEntry({
    symbol,
    standard,
    multiplier: Number(bytes),
    exactMultiplier: bytes,
    isBitUnit: false,
  })

const toBitEntry = (entry: UnitEntry): UnitEntry =>
  new UnitEntry({
    symbol: `${entry.symbol.slice(0, -1)}b`,
    standard: entry.standard,
    multiplier: entry.multiplier / 8,
    exactMultiplier:
      entry.exactMultiplier !== undefined && entry.exactMultiplier % 8n === 0n
        ? entry.exactMultiplier / 8n
        : undefined,
    isBitUnit: true,
  })

const powerSeries = (
  symbols: ReadonlyArray<string>,
  standard: ByteStandard,
  base: bigint,
): ReadonlyArray<UnitEntry> =>
  symbols.map((symbol, power) => byteEntry(symbol, standard, base ** BigInt(power)))

const SI_UNITS = powerSeries(
  ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB", "RB", "QB"],
  "si",
  1000n,
)

const IEC_UNITS = powerSeries(
  ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB", "ZiB", "YiB"],
  "iec",
  1024n,
)

const JEDEC_UNITS = powerSeries(["B", "KB", "MB", "GB", "TB"], "jedec", 1024n)

const keyed = (entries: ReadonlyArray<UnitEntry>): ReadonlyMap<string, UnitEntry> =>
  new Map(entries.map((entry) => [entry.symbol.toUpperCase(), entry] as const))

const TABLES: Readonly<Record<ByteStandard, ReadonlyMap<string, UnitEntry>>> = {
  si: keyed(SI_UNITS),
  iec: keyed(IEC_UNITS),
  jedec: keyed(JEDEC_UNITS),
}

const DECIMAL_BYTE_KEYS: ReadonlySet<string> = new Set(
  SI_UNITS.filter((entry) => entry.symbol !== "B").map((entry) => entry.symbol),
)

/**
 * Byte units defined by a standard, smallest first.
 *
 * @since 0.1.0
 * @category Tables
 */
export const unitsFor = (standard: ByteStandard): ReadonlyArray<UnitEntry> => {
  switch (standard) {
    case "si":
      return SI_UNITS
    case "iec":
      return IEC_UNITS
    case "jedec":
      return JEDEC_UNITS
  }
}

const isRejected = (key: string, isBit: boolean, standard: ByteStandard): boolean => {
  if (isBit) {
    return false
  }
  switch (standard) {
    case "si":
    case "jedec":
      return key === "KIB"
    case "iec":
      return DECIMAL_BYTE_KEYS.has(key)
  }
}

const searchOrder = (standard: ByteStandard): ReadonlyArray<ByteStandard> => [
  standard,
  ...BYTE_STANDARDS.filter((candidate) => candidate !== standard),
]

/**
 * Resolves a unit token under a standard.
 *
 * @since 0.1.0
 * @category Resolution
 * @example
 * ```ts
 * Either.map(resolveUnit("MiB", "si"), (entry) => entry.multiplier) // Right(1048576)
 * Either.map(resolveUnit("Mb", "iec"), (entry) => entry.multiplier) // Right(125000)
 * Either.isLeft(resolveUnit("KiB", "si")) // true
 * ```
 */
export const resolveUnit = (
  token: string,
  standard: ByteStandard,
): Either.Either<UnitEntry, UnknownUnitError> => {
  const trimmed = token.trim()
  const symbol = symbolForWord(trimmed) ?? trimmed
  const isBit = symbol !== "B" && symbol.endsWith("b")
  const key = (isBit ? `${symbol.slice(0, -1)}B` : symbol).toUpperCase()
  const unknown = () => Either.left(new UnknownUnitError({ input: token, unit: trimmed }))

  if (key === "" || isRejected(key, isBit, standard)) {
    return unknown()
  }

  for (const candidate of searchOrder(standard)) {
    if (isBit && candidate === "jedec") {
      continue
    }
    const entry = TABLES[candidate].get(key)
    if (entry !== undefined) {
      return Either.right(isBit ? toBitEntry(entry) : entry)
    }
  }
  return unknown()
}

/**
 * `true` when the token names a byte or bit unit under at least one standard,
 * including symbols a particular standard rejects.
 *
 * @since 0.1.0
 * @category Resolution
 */
export const isKnownUnit = (token: string): boolean =>
  BYTE_STANDARDS.some((standard) => Either.isRight(resolveUnit(token, standard)))

import { Schema } from "effect"
import words from "./unit-words.json" with { type: "json" }

const UnitWordTable = Schema.Record({ key: Schema.String, value: Schema.String })

const UnitWordLocales = Schema.Struct({
  en: UnitWordTable,
  fr: UnitWordTable,
})

const locales = Schema.decodeUnknownSync(UnitWordLocales)(words)

const table: ReadonlyMap<string, string> = new Map(
  [...Object.entries(locales.en), ...Object.entries(locales.fr)].map(
    ([word, symbol]) => [word.normalize("NFC"), symbol] as const,
  ),
)

/** Symbol spelled by a full unit name such as `kilobytes` or `mégaoctets`. */
export const symbolForWord = (word: string): string | undefined =>
  table.get(word.normalize("NFC").toLowerCase())

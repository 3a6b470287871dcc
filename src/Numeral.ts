/**
 * Locale-tolerant numerals.
 *
 * Grouping characters (spaces, no-break spaces, underscores) are dropped and
 * the last `,` or `.` is the decimal separator, so `1 234,56`, `1.234,56`
 * and `1_234.56` all read as `1234.56`.
 *
 * @since 0.1.0
 */

export {
  /**
   * @since 0.1.0
   * @category Numerals
   * @example
   * ```ts
   * normalizeNumeral("1 234,56") // "1234.56"
   * normalizeNumeral(",5") // "0.5"
   * ```
   */
  normalizeNumeral,
  /**
   * @since 0.1.0
   * @category Numerals
   */
  parseNumeral,
} from "./internal/parsing/Numeral.js"

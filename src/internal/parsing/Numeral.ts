const GROUPING = /[\s\u00A0\u202F_]/g
const NON_DIGIT = /\D/g

/**
 * Canonicalizes a locale-formatted numeral. The last `,` or `.` is taken as
 * the decimal separator and every other separator is dropped.
 */
export const normalizeNumeral = (raw: string): string => {
  let text = raw.replace(GROUPING, "")
  const sign = text.startsWith("-") ? "-" : text.startsWith("+") ? "+" : ""
  if (sign !== "") {
    text = text.slice(1)
  }

  let decimalAt: number | undefined
  let digitCount = 0
  for (const char of text) {
    if (char === "," || char === ".") {
      decimalAt = digitCount
    } else if (char >= "0" && char <= "9") {
      digitCount += 1
    }
  }

  const digits = text.replace(NON_DIGIT, "")
  if (digits.length === 0) {
    return `${sign}0`
  }
  if (decimalAt === undefined || decimalAt >= digits.length) {
    return `${sign}${digits}`
  }
  if (decimalAt === 0) {
    return `${sign}0.${digits}`
  }
  return `${sign}${digits.slice(0, decimalAt)}.${digits.slice(decimalAt)}`
}

export const parseNumeral = (raw: string): number => Number(normalizeNumeral(raw))

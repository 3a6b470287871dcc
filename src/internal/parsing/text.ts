const WHITESPACE_RUN = /[\s\u00A0]+/g
const RATE_SLASH = /\/\s*(?:second|sec|s)\b/iy
const LETTER = /\p{L}/u

export const collapseWhitespace = (input: string): string =>
  input.replace(WHITESPACE_RUN, " ").trim()

export const hasLetter = (input: string): boolean => LETTER.test(input)

/**
 * `true` when the input needs the expression evaluator. A slash that starts a
 * `/s`, `/sec` or `/second` suffix belongs to a rate literal, and a minus at
 * the start or after another operator is a sign.
 */
export const containsExpressionOperators = (input: string): boolean => {
  let previous = ""
  for (let index = 0; index < input.length; index++) {
    const char = input.charAt(index)
    switch (char) {
      case "+":
      case "*":
      case "/": {
        RATE_SLASH.lastIndex = index
        const suffix = RATE_SLASH.exec(input)
        if (char === "/" && suffix !== null) {
          index += suffix[0].length - 1
          previous = "s"
          break
        }
        return true
      }
      case "(":
      case ")":
        return true
      case "-":
        if (previous !== "" && !"+-*/(".includes(previous)) {
          return true
        }
        previous = char
        break
      default:
        if (char.trim() !== "") {
          previous = char
        }
    }
  }
  return false
}

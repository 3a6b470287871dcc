/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./Numeral.js"
export * from "./Units.js"
export * from "./Expressions.js"
export * from "./Parsing.js"
export * from "./ByteParser.js"

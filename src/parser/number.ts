import { DOT, LOWER_E, MINUS, PLUS, UPPER_E, isDigit } from "@/parser/bytes"

/**
 * A numeric literal in the representation its spelling selects: any `.`, `e` or `E` makes it a float
 */
export type NumberLiteral = { kind: "integer"; value: bigint } | { kind: "float"; value: number }

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const INTEGER_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Bytes that may appear in a numeric literal run
 */
export const isNumberByte = (byte: number): boolean =>
  isDigit(byte) || byte === PLUS || byte === MINUS || byte === DOT || byte === LOWER_E || byte === UPPER_E

export const isFloatMarker = (byte: number): boolean => byte === DOT || byte === LOWER_E || byte === UPPER_E

/**
 * Parses a numeric literal in the chosen representation.
 *
 * @throws SyntaxError if the literal is malformed for that representation
 * @throws RangeError if an integer does not fit in 64 bits or a float overflows
 */
export function parseNumberLiteral(literal: string, float: boolean): NumberLiteral {
  if (float) {
    if (!FLOAT_PATTERN.test(literal)) {
      throw new SyntaxError(`invalid float literal "${literal}"`)
    }

    const value = Number(literal)
    if (!Number.isFinite(value)) {
      throw new RangeError(`float literal "${literal}" out of range`)
    }

    return { kind: "float", value }
  }

  if (!INTEGER_PATTERN.test(literal)) {
    throw new SyntaxError(`invalid integer literal "${literal}"`)
  }

  const value = BigInt(literal.startsWith("+") ? literal.slice(1) : literal)
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new RangeError(`integer literal "${literal}" out of range`)
  }

  return { kind: "integer", value }
}

import { TextDecoder } from "node:util"
import { BACKSLASH, LOWER_U, QUOTE, SPACE } from "@/parser/bytes"

// Malformed UTF-8 is coerced to U+FFFD rather than rejected; a leading BOM is kept as content
const utf8 = new TextDecoder("utf-8", { ignoreBOM: true })

const REPLACEMENT_CHARACTER = 0xfffd

const SIMPLE_ESCAPES = new Map<number, string>([
  [0x22, '"'],
  [0x5c, "\\"],
  [0x2f, "/"],
  [0x27, "'"],
  [0x62, "\b"],
  [0x66, "\f"],
  [0x6e, "\n"],
  [0x72, "\r"],
  [0x74, "\t"],
])

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff
const isLowSurrogate = (unit: number): boolean => unit >= 0xdc00 && unit <= 0xdfff

const hexValue = (byte: number): number => {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10
  return -1
}

/**
 * Reads the `\uXXXX` escape starting at `index`, returning the code unit or -1
 */
const readUnicodeEscape = (raw: Uint8Array, index: number): number => {
  if (index + 6 > raw.length || raw[index] !== BACKSLASH || raw[index + 1] !== LOWER_U) return -1

  let unit = 0
  for (let i = index + 2; i < index + 6; i++) {
    const digit = hexValue(raw[i])
    if (digit < 0) return -1
    unit = unit * 16 + digit
  }
  return unit
}

const formatCodeUnit = (unit: number): string => unit.toString(16).toUpperCase().padStart(4, "0")

/**
 * Decodes the raw bytes between a string's quotes into text.
 *
 * Runs without a backslash, quote or control byte are decoded as UTF-8 unchanged. Escapes are rewritten,
 * with `\uD800`-`\uDBFF` followed by a `\uDC00`-`\uDFFF` escape joined into one code point; a surrogate
 * that cannot be paired becomes U+FFFD.
 *
 * @returns the text, or `undefined` if the bytes hold a control byte, an unescaped quote or a malformed escape
 */
export function decodeString(raw: Uint8Array): string | undefined {
  let index = 0
  while (index < raw.length) {
    const byte = raw[index]
    if (byte === BACKSLASH || byte === QUOTE || byte < SPACE) break
    index++
  }

  if (index === raw.length) return utf8.decode(raw)

  const parts: string[] = []
  let segment = 0

  while (index < raw.length) {
    const byte = raw[index]

    if (byte === QUOTE || byte < SPACE) return undefined

    if (byte !== BACKSLASH) {
      index++
      continue
    }

    if (index > segment) parts.push(utf8.decode(raw.subarray(segment, index)))
    if (index + 1 >= raw.length) return undefined

    const escaped = raw[index + 1]
    const simple = SIMPLE_ESCAPES.get(escaped)

    if (simple !== undefined) {
      parts.push(simple)
      index += 2
    } else if (escaped === LOWER_U) {
      let codePoint = readUnicodeEscape(raw, index)
      if (codePoint < 0) return undefined
      index += 6

      if (isHighSurrogate(codePoint) || isLowSurrogate(codePoint)) {
        const low = isHighSurrogate(codePoint) ? readUnicodeEscape(raw, index) : -1

        if (isLowSurrogate(low)) {
          codePoint = 0x10000 + ((codePoint - 0xd800) << 10) + (low - 0xdc00)
          index += 6
        } else {
          console.warn(`[eventjson] unpaired surrogate \\u${formatCodeUnit(codePoint)} replaced with U+FFFD`)
          codePoint = REPLACEMENT_CHARACTER
        }
      }

      parts.push(String.fromCodePoint(codePoint))
    } else {
      return undefined
    }

    segment = index
  }

  if (segment < raw.length) parts.push(utf8.decode(raw.subarray(segment)))

  return parts.join("")
}

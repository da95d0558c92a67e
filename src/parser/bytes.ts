export const TAB = 0x09
export const LINE_FEED = 0x0a
export const VERTICAL_TAB = 0x0b
export const FORM_FEED = 0x0c
export const CARRIAGE_RETURN = 0x0d
export const SPACE = 0x20
export const QUOTE = 0x22
export const PLUS = 0x2b
export const COMMA = 0x2c
export const MINUS = 0x2d
export const DOT = 0x2e
export const COLON = 0x3a
export const UPPER_E = 0x45
export const OPEN_BRACKET = 0x5b
export const BACKSLASH = 0x5c
export const CLOSE_BRACKET = 0x5d
export const LOWER_E = 0x65
export const LOWER_F = 0x66
export const LOWER_N = 0x6e
export const LOWER_T = 0x74
export const LOWER_U = 0x75
export const OPEN_BRACE = 0x7b
export const CLOSE_BRACE = 0x7d

/** NEL and NBSP, accepted as whitespace when `latin1Whitespace` is on */
export const NEXT_LINE = 0x85
export const NO_BREAK_SPACE = 0xa0

export const isDigit = (byte: number): boolean => byte >= 0x30 && byte <= 0x39

export const isWhitespace = (byte: number, latin1: boolean): boolean => {
  switch (byte) {
    case SPACE:
    case TAB:
    case LINE_FEED:
    case CARRIAGE_RETURN:
    case VERTICAL_TAB:
    case FORM_FEED:
      return true
    case NEXT_LINE:
    case NO_BREAK_SPACE:
      return latin1
    default:
      return false
  }
}

/**
 * Renders a byte for diagnostics the way it would print as a single character
 */
export const formatByte = (byte: number): string => String.fromCharCode(byte)

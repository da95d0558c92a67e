/**
 * Location-tagged parse errors.
 */

export type ParseErrorKind =
  | "structural" // a grammar expectation was violated
  | "unexpected-end" // the input ran out inside a value
  | "escape-decode" // a string held a control byte or a malformed escape
  | "numeric-format" // a numeric literal failed to parse
  | "source" // the byte source threw
  | "aborted" // the parse was cancelled through its AbortSignal

export const UNEXPECTED_END_MESSAGE = "unexpected end of file"
export const STRING_DECODE_MESSAGE = "unable to decode string into a valid UTF-8 string"
export const ABORTED_MESSAGE = "parse aborted"

type ConstructorOptions = { kind: ParseErrorKind; line: number; position: number; cause?: unknown }

export class ParseError extends Error {
  override readonly name = "ParseError"
  readonly kind: ParseErrorKind
  /** 1-based line of the last byte consumed */
  readonly line: number
  /** 0-based column of the last byte consumed */
  readonly position: number

  constructor(message: string, options: ConstructorOptions) {
    super(message)
    this.kind = options.kind
    this.line = options.line
    this.position = options.position
    if (options.cause !== undefined) this.cause = options.cause
    Object.setPrototypeOf(this, ParseError.prototype)
  }

  override toString(): string {
    return `ParseError: l:${this.line} pos:${this.position} msg:${this.message}`
  }
}

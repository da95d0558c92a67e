import { LINE_FEED, isWhitespace } from "@/parser/bytes"

/** Returned once the source is exhausted (or has failed) */
export const END = -1

/** Returned when the current chunk is used up; await `fill()` and advance again */
export const PENDING = -2

const EMPTY = new Uint8Array(0)

export interface CursorOptions {
  /** Treat 0x85 and 0xA0 as whitespace */
  latin1Whitespace?: boolean
}

/**
 * Byte cursor over a chunked source with line/position bookkeeping.
 *
 * `line` is 1-based and `position` is the 0-based column of the last consumed byte within its line,
 * reset to 0 when a newline is consumed. Reading is synchronous within a chunk; crossing into the next
 * chunk is the only asynchronous step.
 */
export class Cursor {
  line: number = 1
  position: number = 0

  #source: AsyncIterator<Uint8Array>
  #chunk: Uint8Array = EMPTY
  #offset: number = 0
  #ended: boolean = false
  #closed: boolean = false
  #failure: { error: unknown } | undefined
  #latin1Whitespace: boolean

  // push-back state: the last byte, whether it may be replayed, and how to restore the coordinates
  #last: number = 0
  #canPushBack: boolean = false
  #replay: boolean = false
  #crossedNewline: boolean = false
  #columnBeforeNewline: number = 0

  constructor(source: AsyncIterator<Uint8Array>, options: CursorOptions = {}) {
    this.#source = source
    this.#latin1Whitespace = options.latin1Whitespace ?? true
  }

  /**
   * The error thrown by the source, if reading it failed
   */
  get failure(): { error: unknown } | undefined {
    return this.#failure
  }

  advance(): number {
    let byte: number

    if (this.#replay) {
      this.#replay = false
      byte = this.#last
    } else if (this.#offset < this.#chunk.length) {
      byte = this.#chunk[this.#offset++]
    } else if (this.#ended) {
      this.#canPushBack = false
      return END
    } else {
      return PENDING
    }

    this.#last = byte
    this.#canPushBack = true

    if (byte === LINE_FEED) {
      this.#columnBeforeNewline = this.position
      this.line++
      this.position = 0
      this.#crossedNewline = true
    } else {
      this.position++
      this.#crossedNewline = false
    }

    return byte
  }

  /**
   * Un-consumes the byte returned by the last `advance()`. Only one level of push-back exists.
   */
  pushBack(): void {
    if (!this.#canPushBack) {
      throw new Error("Cursor.pushBack() requires a byte consumed by the previous advance()")
    }

    this.#canPushBack = false
    this.#replay = true

    if (this.#crossedNewline) {
      this.line--
      this.position = this.#columnBeforeNewline
    } else {
      this.position--
    }
  }

  /**
   * Advances past whitespace and returns the first other byte, `END` or `PENDING`
   */
  skipWhitespace(): number {
    let byte = this.advance()
    while (byte >= 0 && isWhitespace(byte, this.#latin1Whitespace)) {
      byte = this.advance()
    }
    return byte
  }

  /**
   * Loads the next non-empty chunk. A source that throws is recorded in `failure` and ends the input.
   */
  async fill(): Promise<void> {
    if (this.#ended || this.#offset < this.#chunk.length) return

    try {
      for (;;) {
        const { done, value } = await this.#source.next()
        if (done) {
          this.#ended = true
          return
        }
        if (value.length > 0) {
          this.#chunk = value
          this.#offset = 0
          return
        }
      }
    } catch (error) {
      this.#ended = true
      this.#failure = { error }
    }
  }

  /**
   * Resets the coordinates to the start of a document
   */
  resetCoordinates(): void {
    this.line = 1
    this.position = 0
  }

  /**
   * Releases the source. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    this.#ended = true
    this.#chunk = EMPTY
    await this.#source.return?.()
  }
}

import { ChannelClosedError, RendezvousChannel } from "@/channel/rendezvous"
import { ByteBuffer } from "@/parser/byte-buffer"
import {
  BACKSLASH,
  CLOSE_BRACE,
  CLOSE_BRACKET,
  COLON,
  COMMA,
  LOWER_E,
  LOWER_F,
  LOWER_N,
  LOWER_T,
  OPEN_BRACE,
  OPEN_BRACKET,
  QUOTE,
  formatByte,
} from "@/parser/bytes"
import { Cursor, END, PENDING } from "@/parser/cursor"
import {
  ABORTED_MESSAGE,
  ParseError,
  STRING_DECODE_MESSAGE,
  UNEXPECTED_END_MESSAGE,
  type ParseErrorKind,
} from "@/parser/errors"
import { decodeString } from "@/parser/escape"
import { type JsonEvent } from "@/parser/events"
import { isFloatMarker, isNumberByte, parseNumberLiteral, type NumberLiteral } from "@/parser/number"
import { resolveParserOptions, type ParserOptions, type ResolvedParserOptions } from "@/parser/options"
import { readChunks, type ByteSource } from "@/parser/source"

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error))

// a closed channel is how the consumer stops the parse
const ignoreClosedChannel = (error: unknown): void => {
  if (!(error instanceof ChannelClosedError)) throw error
}

/**
 * Incremental JSON tokenizer that turns a byte stream into structural events.
 *
 * The input is one or more top-level objects or arrays, optionally separated by whitespace. Nothing beyond
 * the current lexeme is held in memory, so inputs of any size can be processed. Each event is handed to the
 * consumer through a rendezvous channel: the parse only advances when the consumer takes the next event.
 *
 * @example
 * ```ts
 * const parser = new EventParser(createReadStream("events.json"))
 *
 * for await (const event of parser.events()) {
 *   if (event.type === "end" && event.error) throw event.error
 *   console.log(formatEvent(event))
 * }
 * ```
 */
export class EventParser {
  #cursor: Cursor
  #options: ResolvedParserOptions
  // scratch space for the lexeme being read; owned by this parse alone
  #buffer: ByteBuffer = new ByteBuffer()
  #channel: RendezvousChannel<JsonEvent> | null = null
  #depth: number = 0
  #started: boolean = false

  constructor(source: ByteSource, options: ParserOptions = {}) {
    this.#options = resolveParserOptions(options)
    this.#cursor = new Cursor(readChunks(source), { latin1Whitespace: this.#options.latin1Whitespace })
  }

  /**
   * Parses the whole input, sending every event into `channel` followed by exactly one `end` event.
   *
   * Parse errors never reject: they arrive as the `error` of the `end` event. Closing the channel stops the
   * parse at its next event. The source is released before the `end` event is sent. A parser runs once.
   *
   * After an abort the `end` event is left on offer in the channel and the returned promise settles without
   * waiting for it to be taken. Otherwise a consumer that neither drains the channel nor closes it leaves this
   * promise pending.
   */
  async parse(channel: RendezvousChannel<JsonEvent>): Promise<void> {
    if (this.#started) throw new Error("EventParser.parse() can only be called once")
    this.#started = true
    this.#channel = channel

    try {
      const error = await this.#run()
      await this.#cursor.close()

      const delivery = channel.send(error ? { type: "end", error } : { type: "end" })
      if (error?.kind === "aborted") {
        void delivery.catch(ignoreClosedChannel)
        return
      }
      await delivery
    } catch (error) {
      ignoreClosedChannel(error)
    } finally {
      await this.#cursor.close()
    }
  }

  /**
   * Events as an async generator, ending after the `end` event. Leaving the loop early stops the parse and
   * releases the source.
   */
  async *events(): AsyncGenerator<JsonEvent, void, undefined> {
    const channel = new RendezvousChannel<JsonEvent>()
    const parsing = this.parse(channel).catch((error: unknown) => {
      channel.close()
      throw error
    })

    try {
      for await (const event of channel) {
        yield event
        if (event.type === "end") return
      }
    } finally {
      channel.close()
      await parsing
    }
  }

  async #run(): Promise<ParseError | undefined> {
    try {
      await this.#readStream()
      return undefined
    } catch (error) {
      if (error instanceof ParseError) return error
      throw error
    }
  }

  async #readStream(): Promise<void> {
    let byte = await this.#skipWhitespace()
    if (byte === END) throw this.#endOfInput()

    for (;;) {
      if (byte === OPEN_BRACE) {
        await this.#readObject()
      } else if (byte === OPEN_BRACKET) {
        await this.#readArray()
      } else {
        throw this.#structural(`unexpected character ${formatByte(byte)}`)
      }

      // end of input right after a complete document is the valid terminator
      byte = await this.#skipWhitespace()
      if (byte === END) {
        if (this.#cursor.failure) throw this.#endOfInput()
        return
      }

      if (this.#options.coordinates === "document") {
        this.#cursor.pushBack()
        this.#cursor.resetCoordinates()
        byte = await this.#next()
      }
    }
  }

  /**
   * Reads an object whose `{` has been consumed
   */
  async #readObject(): Promise<void> {
    this.#enter()
    await this.#emit({ type: "object-start" })

    let byte = await this.#skipWhitespace()
    if (byte === END) throw this.#endOfInput()

    if (byte !== CLOSE_BRACE) {
      this.#cursor.pushBack()

      for (;;) {
        await this.#emit({ type: "object-key" })
        await this.#readString()

        byte = await this.#skipWhitespace()
        if (byte === END) throw this.#endOfInput()
        if (byte !== COLON) throw this.#structural(`expected : but got ${formatByte(byte)}`)

        await this.#emit({ type: "object-value" })
        await this.#readValue()

        byte = await this.#skipWhitespace()
        if (byte === END) throw this.#endOfInput()
        if (byte === CLOSE_BRACE) break
        if (byte !== COMMA) throw this.#structural(`expected , but got ${formatByte(byte)}`)
      }
    }

    await this.#emit({ type: "object-end" })
    this.#depth--
  }

  /**
   * Reads an array whose `[` has been consumed
   */
  async #readArray(): Promise<void> {
    this.#enter()
    await this.#emit({ type: "array-start" })

    let byte = await this.#skipWhitespace()
    if (byte === END) throw this.#endOfInput()

    if (byte !== CLOSE_BRACKET) {
      this.#cursor.pushBack()

      for (;;) {
        await this.#readValue()

        byte = await this.#skipWhitespace()
        if (byte === END) throw this.#endOfInput()
        if (byte === CLOSE_BRACKET) break
        if (byte !== COMMA) throw this.#structural(`expected , but got ${formatByte(byte)}`)
      }
    }

    await this.#emit({ type: "array-end" })
    this.#depth--
  }

  async #readValue(): Promise<void> {
    const byte = await this.#skipWhitespace()

    switch (byte) {
      case END:
        throw this.#endOfInput()
      case QUOTE:
        return this.#readStringBody()
      case OPEN_BRACE:
        return this.#readObject()
      case OPEN_BRACKET:
        return this.#readArray()
      case LOWER_T:
      case LOWER_F:
        this.#cursor.pushBack()
        return this.#readBoolean()
      case LOWER_N:
        this.#cursor.pushBack()
        return this.#readNull()
    }

    if (isNumberByte(byte) && !isFloatMarker(byte)) {
      this.#cursor.pushBack()
      return this.#readNumber()
    }

    throw this.#structural(`unexpected character ${formatByte(byte)}`)
  }

  /**
   * Reads a member name: a string, possibly preceded by whitespace
   */
  async #readString(): Promise<void> {
    const byte = await this.#skipWhitespace()
    if (byte === END) throw this.#endOfInput()
    if (byte !== QUOTE) throw this.#structural(`expected " but got ${formatByte(byte)}`)

    await this.#readStringBody()
  }

  /**
   * Reads a string whose opening quote has been consumed
   */
  async #readStringBody(): Promise<void> {
    const buffer = this.#buffer
    buffer.reset()

    let escaped = false
    for (;;) {
      const byte = this.#cursor.advance()
      if (byte === PENDING) {
        await this.#pull()
        continue
      }
      if (byte === END) throw this.#endOfInput()
      if (byte === QUOTE && !escaped) break

      escaped = !escaped && byte === BACKSLASH
      buffer.push(byte)
    }

    const value = decodeString(buffer.view())
    if (value === undefined) throw this.#error("escape-decode", STRING_DECODE_MESSAGE)

    await this.#emit({ type: "string", value })
  }

  async #readNumber(): Promise<void> {
    const buffer = this.#buffer
    buffer.reset()

    let float = false
    for (;;) {
      const byte = this.#cursor.advance()
      if (byte === PENDING) {
        await this.#pull()
        continue
      }
      if (byte === END) throw this.#endOfInput()
      if (!isNumberByte(byte)) {
        this.#cursor.pushBack()
        break
      }

      if (isFloatMarker(byte)) float = true
      buffer.push(byte)
    }

    const literal = buffer.text()
    let number: NumberLiteral
    try {
      number = parseNumberLiteral(literal, float)
    } catch (error) {
      throw this.#error("numeric-format", errorMessage(error), error)
    }

    await this.#emit({ type: "number", ...number })
  }

  async #readBoolean(): Promise<void> {
    const word = await this.#readWord(4)
    if (word === "true") return this.#emit({ type: "boolean", value: true })
    if (word !== "fals") throw this.#structural(`expected true or false but got ${word}`)

    const byte = await this.#next()
    if (byte === END) throw this.#endOfInput()
    if (byte !== LOWER_E) throw this.#structural(`expected e but got ${formatByte(byte)}`)

    await this.#emit({ type: "boolean", value: false })
  }

  async #readNull(): Promise<void> {
    const word = await this.#readWord(4)
    if (word !== "null") throw this.#structural(`expected null but got ${word}`)

    await this.#emit({ type: "null" })
  }

  async #readWord(length: number): Promise<string> {
    let word = ""
    for (let i = 0; i < length; i++) {
      const byte = await this.#next()
      if (byte === END) throw this.#endOfInput()
      word += formatByte(byte)
    }
    return word
  }

  async #next(): Promise<number> {
    let byte = this.#cursor.advance()
    while (byte === PENDING) {
      await this.#pull()
      byte = this.#cursor.advance()
    }
    return byte
  }

  async #skipWhitespace(): Promise<number> {
    let byte = this.#cursor.skipWhitespace()
    while (byte === PENDING) {
      await this.#pull()
      byte = this.#cursor.skipWhitespace()
    }
    return byte
  }

  async #pull(): Promise<void> {
    this.#throwIfAborted()
    await this.#cursor.fill()
  }

  async #emit(event: JsonEvent): Promise<void> {
    const channel = this.#channel
    if (!channel) throw new Error("EventParser: events emitted outside parse()")

    const signal = this.#options.signal
    this.#throwIfAborted()

    try {
      await channel.send(event, signal)
    } catch (error) {
      if (signal?.aborted) throw this.#error("aborted", ABORTED_MESSAGE, signal.reason)
      throw error
    }
  }

  #enter(): void {
    this.#depth++
    if (this.#depth > this.#options.maxDepth) {
      throw this.#structural(`maximum nesting depth of ${this.#options.maxDepth} exceeded`)
    }
  }

  #throwIfAborted(): void {
    const signal = this.#options.signal
    if (signal?.aborted) throw this.#error("aborted", ABORTED_MESSAGE, signal.reason)
  }

  #error(kind: ParseErrorKind, message: string, cause?: unknown): ParseError {
    return new ParseError(message, { kind, line: this.#cursor.line, position: this.#cursor.position, cause })
  }

  #structural(message: string): ParseError {
    return this.#error("structural", message)
  }

  /**
   * The error for input that ran out mid-value: the source's own failure if it threw, otherwise unexpected end
   */
  #endOfInput(): ParseError {
    const failure = this.#cursor.failure
    if (failure) return this.#error("source", errorMessage(failure.error), failure.error)
    return this.#error("unexpected-end", UNEXPECTED_END_MESSAGE)
  }
}

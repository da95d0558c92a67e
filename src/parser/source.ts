import { TextEncoder } from "node:util"

export type ByteChunk = Uint8Array | string

/**
 * Anything the parser can read bytes from. Node readable streams are async iterables of
 * `Buffer` (or `string` when an encoding is set) and qualify as they are.
 */
export type ByteSource = string | Uint8Array | Iterable<ByteChunk> | AsyncIterable<ByteChunk>

const encoder = new TextEncoder()

const EMPTY = new Uint8Array(0)

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff

/**
 * UTF-8 encoder for text arriving in pieces. A high surrogate ending one piece is held back until the
 * next piece, so a pair split between pieces encodes as one code point.
 */
class TextChunkEncoder {
  #held: string = ""

  encode(chunk: string): Uint8Array {
    let text = this.#held + chunk
    this.#held = ""

    if (text.length > 0 && isHighSurrogate(text.charCodeAt(text.length - 1))) {
      this.#held = text.slice(-1)
      text = text.slice(0, -1)
    }
    return encoder.encode(text)
  }

  /**
   * Encodes whatever is held back; a lone high surrogate becomes U+FFFD
   */
  flush(): Uint8Array {
    if (this.#held === "") return EMPTY
    const text = this.#held
    this.#held = ""
    return encoder.encode(text)
  }
}

/**
 * Normalizes a byte source into a single async iterator of byte chunks.
 * Returning the iterator early releases the underlying source.
 */
export async function* readChunks(source: ByteSource): AsyncGenerator<Uint8Array, void, undefined> {
  if (typeof source === "string") {
    yield encoder.encode(source)
    return
  }
  if (source instanceof Uint8Array) {
    yield source
    return
  }

  const text = new TextChunkEncoder()
  for await (const chunk of source) {
    if (typeof chunk === "string") {
      yield text.encode(chunk)
    } else {
      yield text.flush()
      yield chunk
    }
  }
  yield text.flush()
}

import { TextDecoder } from "node:util"

const utf8 = new TextDecoder()

/**
 * Growable scratch buffer for the raw bytes of one lexeme.
 * Every parser owns its own instance and resets it per lexeme; it is never shared between parses.
 */
export class ByteBuffer {
  #bytes: Uint8Array
  #length: number = 0

  constructor(capacity: number = 64) {
    this.#bytes = new Uint8Array(capacity)
  }

  get length(): number {
    return this.#length
  }

  push(byte: number): void {
    if (this.#length === this.#bytes.length) {
      this.#grow(this.#length + 1)
    }
    this.#bytes[this.#length++] = byte
  }

  reset(): void {
    this.#length = 0
  }

  /**
   * View of the buffered bytes. Only valid until the next push or reset.
   */
  view(): Uint8Array {
    return this.#bytes.subarray(0, this.#length)
  }

  /**
   * The buffered bytes as text; used for numeric literals, which are ASCII by construction
   */
  text(): string {
    return utf8.decode(this.view())
  }

  #grow(required: number): void {
    let capacity = this.#bytes.length * 2
    while (capacity < required) capacity *= 2

    const bytes = new Uint8Array(capacity)
    bytes.set(this.view())
    this.#bytes = bytes
  }
}

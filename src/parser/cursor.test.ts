import { describe, it, expect } from "vitest"
import { Cursor, END, PENDING } from "./cursor"
import { readChunks } from "./source"

const cursorOver = (chunks: string[], latin1Whitespace?: boolean): Cursor =>
  new Cursor(readChunks(chunks), { latin1Whitespace })

/**
 * Reads every byte, filling across chunk boundaries, and returns them as text
 */
async function drain(cursor: Cursor): Promise<string> {
  let text = ""
  for (;;) {
    const byte = cursor.advance()
    if (byte === END) return text
    if (byte === PENDING) {
      await cursor.fill()
      continue
    }
    text += String.fromCharCode(byte)
  }
}

describe("Cursor", () => {
  it("should ask for a fill before the first chunk", async () => {
    const cursor = cursorOver(["ab"])

    expect(cursor.advance()).toBe(PENDING)
    await cursor.fill()
    expect(cursor.advance()).toBe(0x61)
    expect(cursor.advance()).toBe(0x62)
    expect(cursor.advance()).toBe(PENDING)
    await cursor.fill()
    expect(cursor.advance()).toBe(END)
  })

  it("should read across chunks and skip empty ones", async () => {
    expect(await drain(cursorOver(["ab", "", "c", "de"]))).toBe("abcde")
  })

  it("should track lines and positions", async () => {
    const cursor = cursorOver(["ab\nc"])
    await cursor.fill()

    cursor.advance()
    cursor.advance()
    expect([cursor.line, cursor.position]).toEqual([1, 2])

    cursor.advance()
    expect([cursor.line, cursor.position]).toEqual([2, 0])

    cursor.advance()
    expect([cursor.line, cursor.position]).toEqual([2, 1])
  })

  it("should replay a pushed back byte and restore its position", async () => {
    const cursor = cursorOver(["xy"])
    await cursor.fill()

    cursor.advance()
    expect(cursor.advance()).toBe(0x79)
    cursor.pushBack()
    expect(cursor.position).toBe(1)

    expect(cursor.advance()).toBe(0x79)
    expect(cursor.position).toBe(2)
  })

  it("should restore the previous line when a newline is pushed back", async () => {
    const cursor = cursorOver(["abc\n"])
    await cursor.fill()

    for (let i = 0; i < 4; i++) cursor.advance()
    expect([cursor.line, cursor.position]).toEqual([2, 0])

    cursor.pushBack()
    expect([cursor.line, cursor.position]).toEqual([1, 3])
  })

  it("should push back across a chunk boundary", async () => {
    const cursor = cursorOver(["a", "b"])
    await cursor.fill()

    expect(cursor.advance()).toBe(0x61)
    expect(cursor.advance()).toBe(PENDING)
    await cursor.fill()
    expect(cursor.advance()).toBe(0x62)

    cursor.pushBack()
    expect(cursor.advance()).toBe(0x62)
  })

  it("should allow only one level of push-back", async () => {
    const cursor = cursorOver(["ab"])
    await cursor.fill()

    cursor.advance()
    cursor.advance()
    cursor.pushBack()

    expect(() => cursor.pushBack()).toThrow("Cursor.pushBack() requires a byte consumed by the previous advance()")
  })

  it("should skip whitespace and return the next byte", async () => {
    const cursor = cursorOver([" \t\r\n\v\fz"])
    await cursor.fill()

    expect(cursor.skipWhitespace()).toBe(0x7a)
    expect([cursor.line, cursor.position]).toEqual([2, 3])
  })

  it("should treat NEL and NBSP as whitespace only when enabled", async () => {
    const bytes = new Uint8Array([0x85, 0xa0, 0x31])

    const lenient = new Cursor(readChunks(bytes))
    await lenient.fill()
    expect(lenient.skipWhitespace()).toBe(0x31)

    const strict = new Cursor(readChunks(bytes), { latin1Whitespace: false })
    await strict.fill()
    expect(strict.skipWhitespace()).toBe(0x85)
  })

  it("should record a failing source and end the input", async () => {
    const failure = new Error("read failed")
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([0x61])
      throw failure
    }

    const cursor = new Cursor(failing())
    expect(await drain(cursor)).toBe("a")
    expect(cursor.failure).toEqual({ error: failure })
  })

  it("should release the source on close", async () => {
    let released = 0
    async function* source(): AsyncGenerator<Uint8Array> {
      try {
        yield new Uint8Array([0x61])
        yield new Uint8Array([0x62])
      } finally {
        released++
      }
    }

    const cursor = new Cursor(source())
    await cursor.fill()
    await cursor.close()
    await cursor.close()

    expect(released).toBe(1)
    expect(cursor.advance()).toBe(END)
  })

  it("should reset coordinates", async () => {
    const cursor = cursorOver(["a\nb"])
    expect(await drain(cursor)).toBe("a\nb")

    cursor.resetCoordinates()
    expect([cursor.line, cursor.position]).toEqual([1, 0])
  })
})

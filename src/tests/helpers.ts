import { TextEncoder } from "node:util"
import { collectEvents, type JsonEvent, type ParseError, type ParserOptions } from "@/index"

const encoder = new TextEncoder()

/**
 * Chunk sizes every fixture is fed in, so each byte position ends up on a chunk boundary at least once
 */
export const chunkSizes = [1, 2, 3, 7, 64, 1_000_000]

/**
 * Async source yielding the UTF-8 bytes of `text` in chunks of `size`
 */
export async function* chunked(text: string, size: number): AsyncGenerator<Uint8Array> {
  const bytes = encoder.encode(text)
  for (let i = 0; i < bytes.length; i += size) {
    yield bytes.subarray(i, i + size)
  }
}

export const parseChunked = (text: string, size: number, options: ParserOptions = {}): Promise<JsonEvent[]> =>
  collectEvents(chunked(text, size), options)

export const objectStart: JsonEvent = { type: "object-start" }
export const objectKey: JsonEvent = { type: "object-key" }
export const objectValue: JsonEvent = { type: "object-value" }
export const objectEnd: JsonEvent = { type: "object-end" }
export const arrayStart: JsonEvent = { type: "array-start" }
export const arrayEnd: JsonEvent = { type: "array-end" }
export const nullValue: JsonEvent = { type: "null" }
export const end: JsonEvent = { type: "end" }
export const string = (value: string): JsonEvent => ({ type: "string", value })
export const integer = (value: bigint): JsonEvent => ({ type: "number", kind: "integer", value })
export const float = (value: number): JsonEvent => ({ type: "number", kind: "float", value })
export const boolean = (value: boolean): JsonEvent => ({ type: "boolean", value })

/**
 * Splits off the terminal event and returns the fields of its error, if any
 */
export function terminal(events: JsonEvent[]): {
  events: JsonEvent[]
  error?: Pick<ParseError, "kind" | "message" | "line" | "position">
} {
  const last = events[events.length - 1]
  if (!last || last.type !== "end") throw new Error("event stream did not end with an end event")

  const rest = events.slice(0, -1)
  if (!last.error) return { events: rest }

  const { kind, message, line, position } = last.error
  return { events: rest, error: { kind, message, line, position } }
}

/**
 * Rebuilds the documents an event stream describes. Integers come back as numbers.
 */
export function replay(events: JsonEvent[]): unknown[] {
  let index = 0

  const take = (): JsonEvent => {
    const event = events[index++]
    if (!event) throw new Error("event stream ended early")
    return event
  }

  const value = (event: JsonEvent): unknown => {
    switch (event.type) {
      case "object-start": {
        const object: Record<string, unknown> = {}
        for (let next = take(); next.type !== "object-end"; next = take()) {
          const key = take()
          if (next.type !== "object-key" || key.type !== "string") throw new Error("malformed member")
          if (take().type !== "object-value") throw new Error("missing object-value marker")
          object[key.value] = value(take())
        }
        return object
      }
      case "array-start": {
        const array: unknown[] = []
        for (let next = take(); next.type !== "array-end"; next = take()) {
          array.push(value(next))
        }
        return array
      }
      case "string":
      case "boolean":
        return event.value
      case "number":
        return Number(event.value)
      case "null":
        return null
      default:
        throw new Error(`unexpected ${event.type} event`)
    }
  }

  const documents: unknown[] = []
  for (let event = take(); event.type !== "end"; event = take()) {
    documents.push(value(event))
  }
  return documents
}

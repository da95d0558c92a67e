import { ReadableStream } from "node:stream/web"
import { EventParser } from "@/parser/event-parser"
import { type JsonEvent } from "@/parser/events"
import { type ParserOptions } from "@/parser/options"
import { type ByteSource } from "@/parser/source"

/**
 * Parses `source` into an async iterable of events, ending with one `end` event.
 *
 * @example
 * ```ts
 * for await (const event of parseEvents('{"foo": "bar"}')) {
 *   console.log(formatEvent(event))
 * }
 * // object-start, object-key, string "foo", object-value, string "bar", object-end, end
 * ```
 */
export function parseEvents(source: ByteSource, options: ParserOptions = {}): AsyncGenerator<JsonEvent, void, undefined> {
  return new EventParser(source, options).events()
}

/**
 * Parses `source` into a `ReadableStream` of events.
 *
 * The stream keeps no events queued: the parse advances one event per read, and cancelling the stream
 * stops the parse and releases the source.
 */
export function createEventStream(source: ByteSource, options: ParserOptions = {}): ReadableStream<JsonEvent> {
  const events = parseEvents(source, options)

  return new ReadableStream<JsonEvent>(
    {
      async pull(controller) {
        const { done, value } = await events.next()
        if (done) {
          controller.close()
        } else {
          controller.enqueue(value)
        }
      },
      async cancel() {
        await events.return(undefined)
      },
    },
    { highWaterMark: 0 },
  )
}

/**
 * Collects every event of `source`, including the final `end` event. Meant for small inputs.
 */
export async function collectEvents(source: ByteSource, options: ParserOptions = {}): Promise<JsonEvent[]> {
  const events: JsonEvent[] = []
  for await (const event of parseEvents(source, options)) {
    events.push(event)
  }
  return events
}

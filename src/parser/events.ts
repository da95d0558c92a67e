import { type ParseError } from "@/parser/errors"

/**
 * One unit of the event stream.
 *
 * `object-key` and `object-value` carry no data: they mark that the next `string` is a member name, and that
 * the next event starts the member's value. A stream always ends with exactly one `end` event, whose `error`
 * is absent when the input was consumed completely.
 */
export type JsonEvent =
  | { type: "object-start" }
  | { type: "object-key" }
  | { type: "object-value" }
  | { type: "object-end" }
  | { type: "array-start" }
  | { type: "array-end" }
  | { type: "string"; value: string }
  | { type: "number"; kind: "integer"; value: bigint }
  | { type: "number"; kind: "float"; value: number }
  | { type: "boolean"; value: boolean }
  | { type: "null" }
  | { type: "end"; error?: ParseError }

export type JsonEventType = JsonEvent["type"]

/**
 * Single-line rendering of an event for logs and debugging
 *
 * @example
 * formatEvent({ type: "string", value: "foo" }) // 'string "foo"'
 * formatEvent({ type: "number", kind: "float", value: 10 }) // "number 10 (float)"
 */
export function formatEvent(event: JsonEvent): string {
  switch (event.type) {
    case "string":
      return `string ${JSON.stringify(event.value)}`
    case "number":
      return `number ${event.value} (${event.kind})`
    case "boolean":
      return `boolean ${event.value}`
    case "end":
      return event.error ? `end ${event.error.toString()}` : "end"
    default:
      return event.type
  }
}

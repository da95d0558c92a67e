/**
 * eventjson/parser
 *
 * The tokenizer alone: `EventParser`, the consumer helpers built on it, events, errors and options.
 *
 * @example
 * ```ts
 * import { collectEvents } from "eventjson/parser"
 *
 * const events = await collectEvents('{"foo": 10.0}')
 * // [..., { type: "number", kind: "float", value: 10 }, ...]
 * ```
 */

export * from "@/parser"

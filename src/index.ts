/**
 * eventjson
 *
 * An incremental, event-driven JSON tokenizer. Reads a byte stream of any size, including several
 * back-to-back documents, and produces structural events without building the parsed document.
 *
 * @example
 * ```ts
 * import { createReadStream } from "node:fs"
 * import { parseEvents } from "eventjson"
 *
 * let strings = 0
 * for await (const event of parseEvents(createReadStream("huge.json"))) {
 *   if (event.type === "string") strings++
 *   if (event.type === "end" && event.error) throw event.error
 * }
 * ```
 */

// Parser
export * from "./parser"

// Rendezvous hand-off between the parse and its consumer
export * from "./channel"

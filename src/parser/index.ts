export { EventParser } from "@/parser/event-parser"
export { parseEvents, createEventStream, collectEvents } from "@/parser/event-stream"
export { formatEvent, type JsonEvent, type JsonEventType } from "@/parser/events"
export { ParseError, type ParseErrorKind } from "@/parser/errors"
export { ParserOptionsSchema, resolveParserOptions, type ParserOptions, type ResolvedParserOptions } from "@/parser/options"
export { type ByteSource, type ByteChunk } from "@/parser/source"
export { decodeString } from "@/parser/escape"
export { parseNumberLiteral, type NumberLiteral } from "@/parser/number"
export { Cursor, END, PENDING, type CursorOptions } from "@/parser/cursor"

import * as z from "zod"

export const ParserOptionsSchema = z.object({
  /**
   * Whether error coordinates restart at 1:0 for every top-level document ("document")
   * or count from the start of the input ("stream")
   */
  coordinates: z.enum(["document", "stream"]).default("document"),
  /** Accept the bytes 0x85 (NEL) and 0xA0 (NBSP) as whitespace between tokens */
  latin1Whitespace: z.boolean().default(true),
  /** Deepest nesting of objects and arrays before the parse fails */
  maxDepth: z.number().int().positive().default(512),
  /** Cancels the parse; polled at every emitted event and every read from the source */
  signal: z.instanceof(AbortSignal).optional(),
})

export type ParserOptions = z.input<typeof ParserOptionsSchema>
export type ResolvedParserOptions = z.output<typeof ParserOptionsSchema>

/**
 * Validates parser options and applies defaults
 *
 * @throws z.ZodError when an option has the wrong type or value
 */
export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  return ParserOptionsSchema.parse(options)
}

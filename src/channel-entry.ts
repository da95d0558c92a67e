/**
 * eventjson/channel
 *
 * Unbuffered rendezvous channel, for driving `EventParser.parse()` from your own consumer loop.
 *
 * @example
 * ```ts
 * import { RendezvousChannel } from "eventjson/channel"
 * import { EventParser, type JsonEvent } from "eventjson/parser"
 *
 * const channel = new RendezvousChannel<JsonEvent>()
 * const done = new EventParser(source).parse(channel).finally(() => channel.close())
 * for await (const event of channel) handle(event)
 * await done
 * ```
 */

export * from "@/channel"

export { RendezvousChannel, ChannelClosedError } from "@/channel/rendezvous"

import { Conn } from '../ConnectionType'
import { Packet } from '../packet'

export type CommandHandlePacketFn = null | {
  name: string
  fn: (packet: Packet, connection: Conn) => CommandHandlePacketFn
}

/**
 * One request/response exchange. The connection feeds every received packet
 * to `handlePacket` and replaces it with whatever the handler returns, until
 * a handler returns null.
 */
export interface Command<T> {
  handlePacket: CommandHandlePacketFn
  _commandName: string
  /** Sends the request, for commands the client speaks first in. */
  start?(connection: Conn): CommandHandlePacketFn
  result(): T
}

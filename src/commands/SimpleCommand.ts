import { Conn } from '../ConnectionType'
import { MysqlProtocolError } from '../MysqlError'
import { Packet } from '../packet'
import { CommandPacket } from '../packets/commandPacket'
import { OkPacket, Result } from '../packets/okPacket'
import { Command, CommandHandlePacketFn } from './command'

/** A command byte with no argument answered by a single OK (ping, reset). */
export class SimpleCommand implements Command<Result | null> {
  handlePacket: CommandHandlePacketFn = null
  private _result: Result | null = null

  constructor(
    public _commandName: string,
    private readonly command: number
  ) {}

  start(connection: Conn): CommandHandlePacketFn {
    connection.writePacket(new CommandPacket(this.command).toPacket())
    return { name: 'reply', fn: this.reply }
  }

  result() {
    return this._result
  }

  private reply(packet: Packet, connection: Conn): CommandHandlePacketFn {
    if (!packet.isOK()) {
      throw new MysqlProtocolError(
        `Expected OK in reply to ${this._commandName}, got ${packet.describe()}`,
        'PROTOCOL_UNEXPECTED_PACKET'
      )
    }
    this._result = OkPacket.fromPacket(packet, connection.clientEncoding)
    connection.setResult(this._result)
    return null
  }
}

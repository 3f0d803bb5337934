// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_command_phase.html

import { Packet } from '../packet'

export class CommandPacket {
  constructor(
    public command: number,
    public argument = '',
    public encoding = 'utf8'
  ) {}

  toPacket() {
    const packet = Packet.alloc('Command', 1 + this.argument.length * 3)
    packet.writeInt8(this.command)
    packet.writeString(this.argument, this.encoding)
    return packet
  }
}

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_basic_err_packet.html

import errorCodes from '../constants/errorCodes.json'
import { MysqlServerError } from '../MysqlError'
import { Packet } from '../packet'

const ErrorCodeById: Readonly<Record<string, string>> = errorCodes

const SQL_STATE_MARKER = 0x23 // '#'

export class ErrorPacket {
  static fromPacket(packet: Packet, encoding: string, isFatal = false) {
    packet.readInt8() // marker
    const errno = packet.readInt16()
    let sqlState = ''
    if (packet.peekByte() === SQL_STATE_MARKER) {
      packet.skip(1)
      // The SQL state of the ERR_Packet which is always 5 bytes long.
      sqlState = packet.readString(5, 'ascii')
    }
    const message = packet.readString(undefined, encoding)
    return new MysqlServerError(
      message,
      ErrorCodeById[errno] ?? `ER_UNKNOWN_${errno}`,
      errno,
      sqlState,
      isFatal
    )
  }
}

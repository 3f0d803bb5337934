// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_basic_ok_packet.html
// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_basic_eof_packet.html

import { SERVER_MORE_RESULTS_EXISTS } from '../constants/serverStatus'
import { narrowBigInt, Packet } from '../packet'

/** Outcome of the last completed command. */
export type Result = Readonly<{
  status: number
  /** A bigint once past 2^53, like BIGINT cells. */
  affectedRows: number | bigint
  lastInsertId: number | bigint
  warningCount: number
  message: string
}>

export const EMPTY_RESULT: Result = {
  status: 0,
  affectedRows: 0,
  lastInsertId: 0,
  warningCount: 0,
  message: '',
}

export function hasMoreResults(result: Result) {
  return (result.status & SERVER_MORE_RESULTS_EXISTS) !== 0
}

export class OkPacket {
  /** Decodes either terminator form: 0x00 OK or short 0xfe EOF. */
  static fromPacket(packet: Packet, encoding: string): Result {
    if (packet.isEOF()) {
      packet.readInt8() // 0xfe
      // servers older than 4.1 send a bare marker
      if (!packet.haveMoreData()) {
        return EMPTY_RESULT
      }
      const warningCount = packet.readInt16()
      const status = packet.readInt16()
      return { ...EMPTY_RESULT, status, warningCount }
    }

    packet.readInt8() // 0x00
    const affectedRows = narrowBigInt(packet.readLengthCodedBigInt() ?? BigInt(0))
    const lastInsertId = narrowBigInt(packet.readLengthCodedBigInt() ?? BigInt(0))
    const status = packet.readInt16()
    const warningCount = packet.readInt16()
    const message = packet.haveMoreData()
      ? packet.readString(undefined, encoding)
      : ''

    return { status, affectedRows, lastInsertId, warningCount, message }
  }
}

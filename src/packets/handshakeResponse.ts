import { scramblePassword } from '../auth41'
import {
  CONNECT_WITH_DB,
  PLUGIN_AUTH,
  PLUGIN_AUTH_LENENC_CLIENT_DATA,
  SECURE_CONNECTION,
} from '../constants/clientConstants'
import { Packet } from '../packet'
import { encodeString } from '../stringParser'

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_connection_phase_packets_protocol_handshake_response.html

export class HandshakeResponse {
  user: string
  database: string
  clientFlags: number
  maxPacketSize: number
  charsetNumber: number
  encoding: string
  authToken: Buffer

  constructor(handshake: {
    flags: number
    maxPacketSize: number
    charsetNumber: number
    user: string
    database: string
    password: string
    challenge: Buffer
    encoding: string
  }) {
    this.user = handshake.user
    this.database = handshake.database
    this.clientFlags = handshake.flags
    this.maxPacketSize = handshake.maxPacketSize
    this.charsetNumber = handshake.charsetNumber
    this.encoding = handshake.encoding
    this.authToken = scramblePassword(
      encodeString(handshake.password, handshake.encoding),
      handshake.challenge
    )
  }

  toPacket() {
    const isSet = (flag: number) => (this.clientFlags & flag) !== 0

    const packet = Packet.alloc('HandshakeResponse', 128)
    packet.writeInt32(this.clientFlags)
    packet.writeInt32(this.maxPacketSize)
    packet.writeInt8(this.charsetNumber)
    packet.writeZeros(23)
    packet.writeNullTerminatedString(this.user, this.encoding)

    if (isSet(PLUGIN_AUTH_LENENC_CLIENT_DATA)) {
      packet.writeLengthCodedBuffer(this.authToken)
    } else if (isSet(SECURE_CONNECTION)) {
      packet.writeInt8(this.authToken.length)
      packet.writeBuffer(this.authToken)
    } else {
      packet.writeBuffer(this.authToken)
      packet.writeInt8(0)
    }

    if (isSet(CONNECT_WITH_DB)) {
      packet.writeNullTerminatedString(this.database, this.encoding)
    }
    if (isSet(PLUGIN_AUTH)) {
      packet.writeNullTerminatedString('mysql_native_password', 'latin1')
    }

    return packet
  }
}

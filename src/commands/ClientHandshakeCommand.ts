import {
  CharsetToEncoding,
  DEFAULT_CHARSET,
  EncodingToCharset,
} from '../constants/charsetEncodings'
import {
  ClientFlagName,
  COMPRESS,
  flagListToInt,
  flagNames,
} from '../constants/clientConstants'
import { Conn } from '../ConnectionType'
import { MysqlProtocolError } from '../MysqlError'
import { Packet } from '../packet'
import { HandshakePacket } from '../packets/handshake'
import { HandshakeResponse } from '../packets/handshakeResponse'
import { OkPacket, Result } from '../packets/okPacket'
import { Command, CommandHandlePacketFn } from './command'

const SUPPORTED_PROTOCOL_VERSION = 10
const MAX_PACKET_SIZE = 65536

const DEFAULT_CLIENT_FLAGS: ClientFlagName[] = [
  'LONG_PASSWORD',
  'CONNECT_WITH_DB',
  'SECURE_CONNECTION',
  'PROTOCOL_41',
  'MULTI_STATEMENTS',
  'MULTI_RESULTS',
]

export class ClientHandshake implements Command<Result | null> {
  handshake: null | HandshakePacket = null
  clientFlags = 0
  handlePacket: CommandHandlePacketFn
  _commandName = 'ClientHandshake'
  private _result: Result | null = null

  constructor() {
    this.handlePacket = {
      name: 'handshakeInit',
      fn: this.handleHandshakeInitPacket,
    }
  }

  result() {
    return this._result
  }

  private sendCredentials(conn: Conn, handshake: HandshakePacket) {
    if (conn.config.debug) {
      // eslint-disable-next-line
      console.log(
        'Client handshake packet: flags:%d=(%s)',
        this.clientFlags,
        flagNames(this.clientFlags).join(', ')
      )
    }

    const handshakeResponse = new HandshakeResponse({
      flags: this.clientFlags,
      maxPacketSize: MAX_PACKET_SIZE,
      charsetNumber: EncodingToCharset[conn.clientEncoding] ?? DEFAULT_CHARSET,
      user: conn.config.user,
      database: conn.config.database,
      password: conn.config.password,
      challenge: handshake.challenge,
      encoding: conn.clientEncoding,
    })

    conn.writePacket(handshakeResponse.toPacket())
  }

  private handleHandshakeInitPacket(
    helloPacket: Packet,
    connection: Conn
  ): CommandHandlePacketFn {
    const handshake = HandshakePacket.fromPacket(helloPacket)
    this.handshake = handshake

    if (handshake.protocolVersion !== SUPPORTED_PROTOCOL_VERSION) {
      throw new MysqlProtocolError(
        `Unsupported protocol version ${handshake.protocolVersion}`,
        'HANDSHAKE_UNEXPECTED_PACKET'
      )
    }

    if (connection.config.debug) {
      // eslint-disable-next-line
      console.log(
        'Server hello packet: capability flags:%d=(%s) server encoding: %s',
        handshake.capabilityFlags,
        flagNames(handshake.capabilityFlags).join(', '),
        CharsetToEncoding[handshake.characterSet] ?? 'unknown'
      )
    }

    this.clientFlags = flagListToInt(DEFAULT_CLIENT_FLAGS)
    if (connection.config.compress && handshake.capabilityFlags & COMPRESS) {
      this.clientFlags = (this.clientFlags | COMPRESS) >>> 0
    }

    connection.setServerInfo({
      protocolVersion: handshake.protocolVersion,
      serverVersion: handshake.serverVersion,
      connectionId: handshake.connectionId,
      characterSet: handshake.characterSet,
      statusFlags: handshake.statusFlags,
      serverCapabilities: handshake.capabilityFlags,
      capabilities: (this.clientFlags & handshake.capabilityFlags) >>> 0,
    })

    this.sendCredentials(connection, handshake)

    return { name: 'handshakeResult', fn: this.handleHandshakeResult }
  }

  private handleHandshakeResult(
    packet: Packet,
    connection: Conn
  ): CommandHandlePacketFn {
    // auth switch (0xfe) and more-data (0x01) requests land here as well
    if (packet.peekByte() !== 0x00 || !packet.isOK()) {
      throw new MysqlProtocolError(
        `Unexpected packet during handshake phase: ${packet.describe()}`,
        'HANDSHAKE_UNEXPECTED_PACKET'
      )
    }

    this._result = OkPacket.fromPacket(packet, connection.clientEncoding)
    connection.setResult(this._result)

    if (this.clientFlags & COMPRESS) {
      connection.enableCompression()
    }
    return null
  }
}

import { PLUGIN_AUTH, SECURE_CONNECTION } from '../constants/clientConstants'
import { Packet } from '../packet'

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_connection_phase_packets_protocol_handshake_v10.html

export type HandshakeFields = {
  protocolVersion: number
  serverVersion: string
  connectionId: number
  authPluginData1: Buffer
  authPluginData2: Buffer
  capabilityFlags: number
  characterSet: number
  statusFlags: number
  authPluginName: string
}

export class HandshakePacket implements HandshakeFields {
  protocolVersion: number
  serverVersion: string
  connectionId: number
  authPluginData1: Buffer
  authPluginData2: Buffer
  capabilityFlags: number
  characterSet: number
  statusFlags: number
  authPluginName: string

  constructor(args: HandshakeFields) {
    this.protocolVersion = args.protocolVersion
    this.serverVersion = args.serverVersion
    this.connectionId = args.connectionId
    this.authPluginData1 = args.authPluginData1
    this.authPluginData2 = args.authPluginData2
    this.capabilityFlags = args.capabilityFlags
    this.characterSet = args.characterSet
    this.statusFlags = args.statusFlags
    this.authPluginName = args.authPluginName
  }

  /** The 20 byte random challenge, joined from its two parts. */
  get challenge() {
    return Buffer.concat([
      this.authPluginData1,
      this.authPluginData2.subarray(0, 12),
    ])
  }

  static fromPacket(packet: Packet) {
    packet._name = 'Handshake'
    const protocolVersion = packet.readInt8()
    const serverVersion = packet.readNullTerminatedString('utf8')
    const connectionId = packet.readInt32()
    const authPluginData1 = packet.readBuffer(8)
    packet.skip(1)
    let capabilityFlags = packet.readInt16()
    let characterSet = 0
    let statusFlags = 0
    let authPluginDataLength = 0
    let authPluginData2: Buffer = Buffer.alloc(0)
    let authPluginName = ''

    if (packet.haveMoreData()) {
      characterSet = packet.readInt8()
      statusFlags = packet.readInt16()
      // upper 2 bytes
      capabilityFlags = (capabilityFlags | (packet.readInt16() << 16)) >>> 0
      // 0 unless PLUGIN_AUTH is advertised
      authPluginDataLength = packet.readInt8()
      packet.skip(10)

      if (capabilityFlags & SECURE_CONNECTION) {
        // 12 bytes of challenge and a terminating 0
        const len = Math.max(13, authPluginDataLength - 8)
        authPluginData2 = packet.readBuffer(len)
      }

      if (capabilityFlags & PLUGIN_AUTH && packet.haveMoreData()) {
        // some old servers leave out the terminator
        authPluginName = packet
          .readString(undefined, 'ascii')
          .replace(/\0+$/, '')
      }
    }

    return new HandshakePacket({
      protocolVersion,
      serverVersion,
      connectionId,
      authPluginData1,
      authPluginData2,
      capabilityFlags,
      characterSet,
      statusFlags,
      authPluginName,
    })
  }
}

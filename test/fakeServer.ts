import { Duplex } from 'node:stream'
import { doubleSha1, verifyToken } from '../src/auth41'
import { CompressedTransport } from '../src/compressedTransport'
import {
  COMPRESS,
  CONNECT_WITH_DB,
  LONG_PASSWORD,
  MULTI_RESULTS,
  MULTI_STATEMENTS,
  PLUGIN_AUTH,
  PROTOCOL_41,
  SECURE_CONNECTION,
} from '../src/constants/clientConstants'
import {
  COM_PING,
  COM_QUERY,
  COM_QUIT,
  COM_RESET_CONNECTION,
} from '../src/constants/commands'
import {
  SERVER_MORE_RESULTS_EXISTS,
  SERVER_STATUS_AUTOCOMMIT,
} from '../src/constants/serverStatus'
import { MYSQL_TYPE_VAR_STRING } from '../src/constants/types'
import { Packet } from '../src/packet'
import { PacketChannel } from '../src/packetChannel'
import { SocketStream } from '../src/socketStream'
import { PlainTransport } from '../src/transport'
import { socketPair } from './socketPair'

export const CHALLENGE = Buffer.from(
  Array.from({ length: 20 }, (_, i) => i + 1)
)

export const DEFAULT_SERVER_CAPABILITIES =
  LONG_PASSWORD |
  CONNECT_WITH_DB |
  PROTOCOL_41 |
  SECURE_CONNECTION |
  MULTI_STATEMENTS |
  MULTI_RESULTS |
  PLUGIN_AUTH

export type FakeColumn = { name: string; type: number; flags?: number }

export type FakeReply =
  | {
      kind: 'ok'
      affectedRows?: number | bigint
      lastInsertId?: number | bigint
      warningCount?: number
      message?: string
    }
  | { kind: 'resultset'; columns: FakeColumn[]; rows: (string | null)[][] }
  | { kind: 'error'; errno: number; sqlState: string; message: string }
  /** Written verbatim, one payload per packet. */
  | { kind: 'raw'; payloads: Buffer[] }
  /** Never answers. */
  | { kind: 'silent' }
  /** Drops the connection. */
  | { kind: 'drop' }

export type FakeServerOptions = {
  user?: string
  password?: string
  database?: string
  capabilities?: number
  connectionId?: number
  serverVersion?: string
  /** Drop the connection instead of answering the handshake response. */
  dropDuringHandshake?: boolean
  onQuery?: (sql: string) => FakeReply[]
}

export type ReceivedHandshake = {
  flags: number
  maxPacketSize: number
  charset: number
  user: string
  token: Buffer
  database: string
}

// ==============================
// server side packets
// ==============================
export function greetingPacket(
  capabilities: number,
  connectionId = 7,
  serverVersion = '8.0.36-fake'
) {
  const packet = Packet.alloc('Greeting')
  packet.writeInt8(10)
  packet.writeNullTerminatedString(serverVersion, 'utf8')
  packet.writeInt32(connectionId)
  packet.writeBuffer(CHALLENGE.subarray(0, 8))
  packet.writeInt8(0)
  packet.writeInt16(capabilities & 0xffff)
  packet.writeInt8(33)
  packet.writeInt16(SERVER_STATUS_AUTOCOMMIT)
  packet.writeInt16(capabilities >>> 16)
  packet.writeInt8(CHALLENGE.length + 1)
  packet.writeZeros(10)
  packet.writeBuffer(CHALLENGE.subarray(8))
  packet.writeInt8(0)
  if (capabilities & PLUGIN_AUTH) {
    packet.writeNullTerminatedString('mysql_native_password', 'latin1')
  }
  return packet
}

export function okPacket(
  fields: {
    affectedRows?: number | bigint
    lastInsertId?: number | bigint
    status?: number
    warningCount?: number
    message?: string
  } = {}
) {
  const packet = Packet.alloc('OK')
  packet.writeInt8(0x00)
  packet.writeLengthCodedNumber(fields.affectedRows ?? 0)
  packet.writeLengthCodedNumber(fields.lastInsertId ?? 0)
  packet.writeInt16(fields.status ?? SERVER_STATUS_AUTOCOMMIT)
  packet.writeInt16(fields.warningCount ?? 0)
  packet.writeString(fields.message ?? '', 'utf8')
  return packet
}

export function eofPacket(status = SERVER_STATUS_AUTOCOMMIT, warningCount = 0) {
  const packet = Packet.alloc('EOF')
  packet.writeInt8(0xfe)
  packet.writeInt16(warningCount)
  packet.writeInt16(status)
  return packet
}

export function errorPacket(errno: number, sqlState: string, message: string) {
  const packet = Packet.alloc('Error')
  packet.writeInt8(0xff)
  packet.writeInt16(errno)
  packet.writeString('#' + sqlState, 'ascii')
  packet.writeString(message, 'utf8')
  return packet
}

export function columnCountPacket(count: number) {
  const packet = Packet.alloc('ColumnCount')
  packet.writeLengthCodedNumber(count)
  return packet
}

export function columnDefinitionPacket(column: FakeColumn) {
  const packet = Packet.alloc('ColumnDefinition')
  packet.writeLengthCodedString('def', 'utf8')
  packet.writeLengthCodedString('test', 'utf8')
  packet.writeLengthCodedString('t', 'utf8')
  packet.writeLengthCodedString('t', 'utf8')
  packet.writeLengthCodedString(column.name, 'utf8')
  packet.writeLengthCodedString(column.name, 'utf8')
  packet.writeLengthCodedNumber(0x0c)
  packet.writeInt16(33)
  packet.writeInt32(255)
  packet.writeInt8(column.type)
  packet.writeInt16(column.flags ?? 0)
  packet.writeInt8(0)
  packet.writeZeros(2)
  return packet
}

export function rowPacket(values: (string | null)[]) {
  const packet = Packet.alloc('Row')
  for (const value of values) {
    packet.writeLengthCodedString(value, 'utf8')
  }
  return packet
}

function parseHandshakeResponse(packet: Packet): ReceivedHandshake {
  const flags = packet.readInt32()
  const maxPacketSize = packet.readInt32()
  const charset = packet.readInt8()
  packet.skip(23)
  const user = packet.readNullTerminatedString('utf8')
  const token = Buffer.from(packet.readBuffer(packet.readInt8()))
  const database =
    flags & CONNECT_WITH_DB ? packet.readNullTerminatedString('utf8') : ''
  return { flags, maxPacketSize, charset, user, token, database }
}

function isStatement(reply: FakeReply) {
  return reply.kind === 'ok' || reply.kind === 'resultset'
}

/**
 * Speaks the server half of the protocol over an in-memory stream pair.
 * Hand `server.connect` to the client as its `stream` option.
 */
export class FakeServer {
  readonly queries: string[] = []
  readonly commands: number[] = []
  handshake: ReceivedHandshake | null = null
  compressed = false
  database: string
  error: unknown = null
  private running: Promise<void> | null = null

  constructor(private readonly options: FakeServerOptions = {}) {
    this.database = options.database ?? ''
  }

  connect = (): Duplex => {
    const [client, server] = socketPair()
    this.running = this.serve(server).catch(err => {
      this.error = err
    })
    return client
  }

  /** Resolves once the server side of the session has finished. */
  finished() {
    return this.running ?? Promise.resolve()
  }

  private async serve(socket: Duplex) {
    const stream = new SocketStream(socket, 0)
    const channel = new PacketChannel(new PlainTransport(stream))
    const capabilities =
      this.options.capabilities ?? DEFAULT_SERVER_CAPABILITIES

    channel.writePacket(
      greetingPacket(
        capabilities,
        this.options.connectionId,
        this.options.serverVersion
      )
    )

    const handshake = parseHandshakeResponse(await channel.readPacket())
    this.handshake = handshake

    if (this.options.dropDuringHandshake) {
      stream.destroy()
      return
    }

    if (!this.checkCredentials(handshake)) {
      channel.writePacket(
        errorPacket(
          1045,
          '28000',
          `Access denied for user '${handshake.user}'@'localhost' (using password: YES)`
        )
      )
      await stream.end()
      stream.destroy()
      return
    }

    if (handshake.database !== '') {
      this.database = handshake.database
    }
    channel.writePacket(okPacket())

    if (handshake.flags & capabilities & COMPRESS) {
      channel.useTransport(new CompressedTransport(stream))
      this.compressed = true
    }

    for (;;) {
      channel.resetSequenceId()
      const packet = await channel.readPacket().catch(() => null)
      if (packet === null) {
        return
      }

      const command = packet.readInt8()
      this.commands.push(command)

      if (command === COM_QUIT) {
        return
      }
      if (command === COM_PING || command === COM_RESET_CONNECTION) {
        channel.writePacket(okPacket())
        continue
      }
      if (command !== COM_QUERY) {
        channel.writePacket(errorPacket(1047, '08S01', 'Unknown command'))
        continue
      }

      const sql = packet.readString(undefined, 'utf8')
      this.queries.push(sql)
      const keepGoing = this.reply(channel, stream, this.answer(sql))
      if (!keepGoing) {
        return
      }
    }
  }

  private checkCredentials(handshake: ReceivedHandshake) {
    if (
      this.options.user !== undefined &&
      handshake.user !== this.options.user
    ) {
      return false
    }
    const password = this.options.password ?? ''
    if (password === '') {
      return handshake.token.length === 0
    }
    return verifyToken(
      CHALLENGE,
      handshake.token,
      doubleSha1(Buffer.from(password, 'utf8'))
    )
  }

  private answer(sql: string): FakeReply[] {
    if (sql === 'SELECT DATABASE()') {
      return [
        {
          kind: 'resultset',
          columns: [{ name: 'DATABASE()', type: MYSQL_TYPE_VAR_STRING }],
          rows: [[this.database === '' ? null : this.database]],
        },
      ]
    }
    const use = /^USE `((?:[^`]|``)+)`$/.exec(sql)
    if (use) {
      this.database = use[1].replace(/``/g, '`')
      return [{ kind: 'ok' }]
    }
    return this.options.onQuery?.(sql) ?? [{ kind: 'ok' }]
  }

  /** Returns false when the connection was dropped. */
  private reply(
    channel: PacketChannel,
    stream: SocketStream,
    replies: FakeReply[]
  ) {
    const lastStatement = replies.map(isStatement).lastIndexOf(true)

    for (const [index, reply] of replies.entries()) {
      const status =
        index < lastStatement
          ? SERVER_STATUS_AUTOCOMMIT | SERVER_MORE_RESULTS_EXISTS
          : SERVER_STATUS_AUTOCOMMIT

      switch (reply.kind) {
        case 'ok':
          channel.writePacket(okPacket({ ...reply, status }))
          break
        case 'resultset':
          channel.writePacket(columnCountPacket(reply.columns.length))
          for (const column of reply.columns) {
            channel.writePacket(columnDefinitionPacket(column))
          }
          channel.writePacket(eofPacket())
          for (const row of reply.rows) {
            channel.writePacket(rowPacket(row))
          }
          channel.writePacket(eofPacket(status))
          break
        case 'error':
          channel.writePacket(
            errorPacket(reply.errno, reply.sqlState, reply.message)
          )
          return true
        case 'raw':
          for (const payload of reply.payloads) {
            channel.writePacket(new Packet(0, payload))
          }
          break
        case 'silent':
          return true
        case 'drop':
          stream.destroy()
          return false
      }
    }
    return true
  }
}

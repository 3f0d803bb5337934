import { ClientHandshake } from './commands/ClientHandshakeCommand'
import { Command } from './commands/command'
import { QueryCommand } from './commands/QueryCommand'
import { SimpleCommand } from './commands/SimpleCommand'
import { CompressedTransport } from './compressedTransport'
import { COM_PING, COM_QUIT, COM_RESET_CONNECTION } from './constants/commands'
import { ConnectionStateMachine } from './connectionState'
import {
  Conn,
  ConnectionConfig,
  ConnectionOptions,
  resolveConnectionOptions,
  ServerInfo,
} from './ConnectionType'
import { MysqlError, MysqlTransportError } from './MysqlError'
import { Packet } from './packet'
import { PacketChannel } from './packetChannel'
import { CommandPacket } from './packets/commandPacket'
import { ErrorPacket } from './packets/errorPacket'
import { EMPTY_RESULT, Result } from './packets/okPacket'
import { ResultSet } from './resultSet'
import { connectSocket, SocketStream } from './socketStream'
import { quoteIdentifier, quoteString } from './sqlString'
import { ColumnValue } from './textParser'
import { PlainTransport } from './transport'

/** Rows expected from a query, used to size the row store up front. */
const DEFAULT_ROW_CAPACITY = 16

/**
 * One session with the server. Commands run strictly one at a time: each
 * call awaits the full reply before the connection accepts another.
 */
export class MysqlConnection {
  readonly config: ConnectionOptions
  readonly clientEncoding: string

  private machine = new ConnectionStateMachine()
  private stream: SocketStream | null = null
  private channel: PacketChannel | null = null
  private readonly conn: Conn

  private _result: Result | null = null
  private _serverInfo: ServerInfo | null = null
  private _database = ''

  constructor(config: ConnectionConfig = {}) {
    this.config = resolveConnectionOptions(config)
    this.clientEncoding = this.config.encoding

    this.conn = {
      config: this.config,
      clientEncoding: this.clientEncoding,
      writePacket: packet => this.writePacket(packet),
      transition: state => this.machine.transition(state),
      setResult: result => {
        this._result = result
      },
      setServerInfo: info => {
        this._serverInfo = info
      },
      enableCompression: () => this.enableCompression(),
    }
  }

  get state() {
    return this.machine.state
  }

  /** Outcome of the most recently completed command. */
  get result() {
    return this._result
  }

  get serverInfo() {
    return this._serverInfo
  }

  get database() {
    return this._database
  }

  get rowsAffected(): number | bigint {
    return this._result?.affectedRows ?? 0
  }

  get lastInsertId(): number | bigint {
    return this._result?.lastInsertId ?? 0
  }

  async open(): Promise<void> {
    this.machine.assertIs('closed')
    this.machine.transition('connecting')

    try {
      const socket = this.config.stream
        ? await this.config.stream()
        : await connectSocket(
            this.config.host,
            this.config.port,
            this.config.connectTimeout
          )

      const stream = new SocketStream(socket, this.config.connectTimeout)
      this.stream = stream
      this.channel = new PacketChannel(new PlainTransport(stream))

      await this.runCommand(new ClientHandshake())

      stream.setReadTimeout(this.config.commandTimeout)
      this.machine.transition('open')

      if (this.config.debug) {
        // eslint-disable-next-line
        console.log(
          'Connected to %s as connection %d',
          this._serverInfo?.serverVersion,
          this._serverInfo?.connectionId
        )
      }

      await this.updateDatabaseName()
    } catch (err) {
      await this.close()
      throw err
    }
  }

  /** Always ends closed, whatever state the session is in. */
  async close(): Promise<void> {
    const stream = this.stream
    const channel = this.channel
    this.stream = null
    this.channel = null

    if (stream) {
      if (channel && stream.error === null) {
        try {
          channel.resetSequenceId()
          channel.writePacket(new CommandPacket(COM_QUIT).toPacket())
        } catch (err) {
          this.logCloseError(err)
        }
      }
      await stream.end()
      stream.destroy()
    }

    this.machine.forceClosed()
  }

  async execute(sql: string): Promise<Result> {
    await this.execCommand(new QueryCommand(sql, 0))
    return this._result ?? EMPTY_RESULT
  }

  async query(sql: string): Promise<ResultSet | null> {
    const sets = await this.execCommand(
      new QueryCommand(sql, DEFAULT_ROW_CAPACITY)
    )
    return sets?.[0] ?? null
  }

  queryMultiple(sql: string): Promise<ResultSet[] | null> {
    return this.execCommand(new QueryCommand(sql, DEFAULT_ROW_CAPACITY))
  }

  /** First column of the first row, or null when there is none. */
  async queryScalar(sql: string): Promise<ColumnValue> {
    const sets = await this.execCommand(new QueryCommand(sql, 1))
    const first = sets?.[0]
    if (!first || first.rowCount === 0 || first.columnCount === 0) {
      return null
    }
    return first.getValue(0, 0)
  }

  async ping(): Promise<void> {
    await this.execCommand(new SimpleCommand('Ping', COM_PING))
  }

  async resetConnection(): Promise<void> {
    await this.execCommand(
      new SimpleCommand('ResetConnection', COM_RESET_CONNECTION)
    )
  }

  async changeDatabase(name: string): Promise<void> {
    await this.execute(`USE ${quoteIdentifier(name)}`)
    await this.updateDatabaseName()
  }

  quoteIdentifier(name: string, field?: string) {
    return quoteIdentifier(name, field)
  }

  quoteString(value: string) {
    return quoteString(value)
  }

  private async updateDatabaseName() {
    const name = await this.queryScalar('SELECT DATABASE()')
    this._database = typeof name === 'string' ? name : ''
  }

  private async execCommand<T>(command: Command<T>): Promise<T> {
    this.machine.assertIs('open')
    this.machine.transition('executing')

    try {
      return await this.runCommand(command)
    } catch (err) {
      // a fatal error leaves the stream at an unknown position
      if (!(err instanceof MysqlError) || err.isFatal) {
        await this.close()
      }
      throw err
    } finally {
      if (!this.machine.is('closed')) {
        this.machine.transition('open')
      }
    }
  }

  private async runCommand<T>(command: Command<T>): Promise<T> {
    const channel = this.requireChannel()
    channel.resetSequenceId()

    if (command.start) {
      command.handlePacket = command.start(this.conn)
    }

    while (command.handlePacket) {
      const handler = command.handlePacket
      const packet = await channel.readPacket()

      if (this.config.debug) {
        // eslint-disable-next-line
        console.log(
          ` <== ${command._commandName}#${handler.name}(${packet.sequenceId},${packet.type() || 'Data'},${packet.length()})`
        )
      }

      if (packet.isError()) {
        // errors during the handshake end the session
        throw ErrorPacket.fromPacket(
          packet,
          this.clientEncoding,
          this.machine.is('connecting')
        )
      }

      command.handlePacket = handler.fn.call(command, packet, this.conn)
    }

    return command.result()
  }

  private writePacket(packet: Packet) {
    this.requireChannel().writePacket(packet)

    if (this.config.debug) {
      // eslint-disable-next-line
      console.log(
        ` ==> ${packet._name}(${packet.sequenceId},${packet.numPackets},${packet.length()})`
      )
    }
  }

  private enableCompression() {
    const stream = this.stream
    const channel = this.requireChannel()
    if (stream === null) {
      throw new MysqlTransportError('Connection is closed', 'CONNECTION_CLOSED')
    }
    channel.useTransport(new CompressedTransport(stream))

    if (this.config.debug) {
      // eslint-disable-next-line
      console.log('Compression enabled')
    }
  }

  private requireChannel() {
    if (this.channel === null) {
      throw new MysqlTransportError('Connection is closed', 'CONNECTION_CLOSED')
    }
    return this.channel
  }

  private logCloseError(err: unknown) {
    if (this.config.debug) {
      // eslint-disable-next-line
      console.log('Error while closing connection', err)
    }
  }
}

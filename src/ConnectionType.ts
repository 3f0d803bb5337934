import { Duplex } from 'node:stream'
import { ConnectionState } from './connectionState'
import { Packet } from './packet'
import { Result } from './packets/okPacket'

export type ConnectionOptions = Readonly<{
  host: string
  port: number
  user: string
  password: string
  database: string
  /** Text encoding for SQL, names and values. */
  encoding: string
  /** Milliseconds allowed for the TCP connect and the handshake. */
  connectTimeout: number
  /** Milliseconds to wait for each server response once connected. 0 disables. */
  commandTimeout: number
  compress: boolean
  debug: boolean
  /** Supplies an already connected stream instead of opening a TCP socket. */
  stream?: () => Duplex | Promise<Duplex>
}>

export type ConnectionConfig = Partial<ConnectionOptions>

export function resolveConnectionOptions(
  config: ConnectionConfig = {}
): ConnectionOptions {
  return Object.freeze({
    host: config.host ?? 'localhost',
    port: config.port ?? 3306,
    user: config.user ?? '',
    password: config.password ?? '',
    database: config.database ?? '',
    encoding: config.encoding ?? 'utf8',
    connectTimeout: config.connectTimeout ?? 10000,
    commandTimeout: config.commandTimeout ?? 30000,
    compress: config.compress ?? false,
    debug: config.debug ?? false,
    stream: config.stream,
  })
}

export type ServerInfo = Readonly<{
  protocolVersion: number
  serverVersion: string
  connectionId: number
  characterSet: number
  statusFlags: number
  /** Flags advertised in the greeting. */
  serverCapabilities: number
  /** Client flags AND server flags. */
  capabilities: number
}>

/** What a running command may see and touch on its connection. */
export type Conn = {
  readonly config: ConnectionOptions
  readonly clientEncoding: string

  writePacket(packet: Packet): void
  transition(state: ConnectionState): void
  setResult(result: Result): void
  setServerInfo(info: ServerInfo): void
  enableCompression(): void
}

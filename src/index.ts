export { MysqlConnection } from './connection'
export { createMysqlConnection, withConnection } from './createMysqlConnection'
export type { Connection } from './createMysqlConnection'
export {
  resolveConnectionOptions,
  type ConnectionConfig,
  type ConnectionOptions,
  type ServerInfo,
} from './ConnectionType'
export type { ConnectionState } from './connectionState'
export {
  MysqlError,
  MysqlProtocolError,
  MysqlServerError,
  MysqlTransportError,
  MysqlUsageError,
} from './MysqlError'
export type { Result } from './packets/okPacket'
export { ResultSet } from './resultSet'
export type { InternalType, ResultField, ValueType } from './fieldTypes'
export type { ColumnValue, ParsedRowType } from './textParser'
export { quoteIdentifier, quoteString } from './sqlString'
export { scramblePassword } from './auth41'

import { MysqlConnection } from './connection'
import { ConnectionConfig } from './ConnectionType'

/** Builds a connection and opens it. */
export async function createMysqlConnection(config: ConnectionConfig) {
  const conn = new MysqlConnection(config)
  await conn.open()
  return conn
}

/**
 * Opens a connection for the duration of `fn` and closes it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withConnection<T>(
  config: ConnectionConfig,
  fn: (conn: MysqlConnection) => Promise<T>
): Promise<T> {
  const conn = await createMysqlConnection(config)
  try {
    return await fn(conn)
  } finally {
    await conn.close()
  }
}

export type Connection = MysqlConnection

export class MysqlError extends Error {
  errno: number | null = null
  sqlState: string | null = null
  sqlMessage: string | null = null

  constructor(message: string, public code: string, public isFatal: boolean) {
    super(message)

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, MysqlError.prototype)
  }

  toString() {
    return this.message
  }
}

/** Operation invoked while the connection is in a state that does not allow it. */
export class MysqlUsageError extends MysqlError {
  constructor(message: string, code = 'CONNECTION_STATE') {
    super(message, code, false)
    Object.setPrototypeOf(this, MysqlUsageError.prototype)
  }
}

/** The server sent something this client cannot make sense of. */
export class MysqlProtocolError extends MysqlError {
  constructor(message: string, code = 'PROTOCOL_ERROR') {
    super(message, code, true)
    Object.setPrototypeOf(this, MysqlProtocolError.prototype)
  }
}

export class MysqlTransportError extends MysqlError {
  constructor(message: string, code = 'PROTOCOL_CONNECTION_LOST', cause?: Error) {
    super(message, code, true)
    Object.setPrototypeOf(this, MysqlTransportError.prototype)
    if (cause) this.cause = cause
  }

  static fromSocketError(err: Error) {
    if (err instanceof MysqlError) return err
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
    return new MysqlTransportError(err.message, code, err)
  }
}

/** ERR packet sent by the server. */
export class MysqlServerError extends MysqlError {
  constructor(
    message: string,
    code: string,
    errno: number,
    sqlState: string,
    isFatal = false
  ) {
    super(message, code, isFatal)
    Object.setPrototypeOf(this, MysqlServerError.prototype)
    this.errno = errno
    this.sqlState = sqlState
    this.sqlMessage = message
  }
}

import { connect, Socket } from 'node:net'
import { Duplex } from 'node:stream'
import { ByteQueue } from './byteQueue'
import {
  MysqlError,
  MysqlProtocolError,
  MysqlTransportError,
} from './MysqlError'

type PendingRead = {
  length: number
  resolve: (data: Buffer) => void
  reject: (err: MysqlError) => void
  timer: NodeJS.Timeout | null
}

export function connectSocket(
  host: string,
  port: number,
  timeout: number
): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect(port, host)

    // 0 waits for the operating system to give up
    const timer =
      timeout > 0
        ? setTimeout(() => {
            socket.destroy()
            reject(
              new MysqlTransportError(
                `Connecting to ${host}:${port} timed out after ${timeout} ms`,
                'ETIMEDOUT'
              )
            )
          }, timeout)
        : undefined

    const onError = (err: Error) => {
      clearTimeout(timer)
      reject(MysqlTransportError.fromSocketError(err))
    }

    socket.once('error', onError)
    socket.once('connect', () => {
      clearTimeout(timer)
      socket.removeListener('error', onError)
      socket.setNoDelay(true)
      resolve(socket)
    })
  })
}

/**
 * Turns the push-style data events of a socket into awaitable reads of an
 * exact number of bytes. Only one read may be pending at a time.
 */
export class SocketStream {
  private received = new ByteQueue()
  private pending: PendingRead | null = null
  private fatalError: MysqlError | null = null

  constructor(
    readonly socket: Duplex,
    private readTimeout: number
  ) {
    socket.on('data', this.onData)
    socket.on('error', this.onError)
    socket.on('end', this.onClosed)
    socket.on('close', this.onClosed)
    if (socket.destroyed || socket.readableEnded) {
      this.onClosed()
    }
  }

  get error() {
    return this.fatalError
  }

  setReadTimeout(timeout: number) {
    this.readTimeout = timeout
  }

  read(length: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(
        new MysqlProtocolError(
          'A read is already waiting on this connection',
          'PROTOCOL_CONCURRENT_READ'
        )
      )
    }
    if (this.received.length >= length) {
      return Promise.resolve(this.received.take(length))
    }
    if (this.fatalError) {
      return Promise.reject(this.fatalError)
    }

    return new Promise<Buffer>((resolve, reject) => {
      const pending: PendingRead = { length, resolve, reject, timer: null }
      if (this.readTimeout > 0) {
        const timeout = this.readTimeout
        pending.timer = setTimeout(() => {
          this.fail(
            new MysqlTransportError(
              `Timed out after ${timeout} ms waiting for the server`,
              'PROTOCOL_SEQUENCE_TIMEOUT'
            )
          )
        }, timeout)
      }
      this.pending = pending
    })
  }

  write(data: Buffer) {
    if (this.fatalError) {
      throw this.fatalError
    }
    this.socket.write(data, err => {
      if (err) {
        this.fail(MysqlTransportError.fromSocketError(err))
      }
    })
  }

  end(): Promise<void> {
    return new Promise<void>(resolve => {
      if (this.socket.destroyed || this.socket.writableEnded) {
        resolve()
        return
      }
      this.socket.once('close', () => resolve())
      this.socket.end(() => resolve())
    })
  }

  destroy() {
    this.fail(
      new MysqlTransportError('Connection closed by client', 'CONNECTION_CLOSED')
    )
    this.socket.destroy()
  }

  private onData = (data: Buffer) => {
    this.received.push(data)
    this.flush()
  }

  private onError = (err: Error) => {
    this.fail(MysqlTransportError.fromSocketError(err))
  }

  private onClosed = () => {
    this.fail(
      new MysqlTransportError(
        'Connection lost: The server closed the connection.',
        'PROTOCOL_CONNECTION_LOST'
      )
    )
  }

  private flush() {
    const pending = this.pending
    if (pending === null || this.received.length < pending.length) {
      return
    }
    this.pending = null
    if (pending.timer) clearTimeout(pending.timer)
    pending.resolve(this.received.take(pending.length))
  }

  private fail(err: MysqlError) {
    if (this.fatalError === null) {
      this.fatalError = err
    }
    const pending = this.pending
    if (pending) {
      this.pending = null
      if (pending.timer) clearTimeout(pending.timer)
      pending.reject(this.fatalError)
    }
  }
}

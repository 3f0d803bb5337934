import { Duplex } from 'node:stream'

class PairEnd extends Duplex {
  peer: PairEnd | null = null

  _read() {}

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ) {
    this.peer?.push(chunk)
    callback()
  }

  _final(callback: (error?: Error | null) => void) {
    this.peer?.push(null)
    callback()
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void) {
    const peer = this.peer
    this.peer = null
    if (peer && !peer.destroyed) {
      peer.destroy()
    }
    callback(error)
  }
}

/** Two in-memory stream ends; bytes written to one are read from the other. */
export function socketPair(): [Duplex, Duplex] {
  const client = new PairEnd()
  const server = new PairEnd()
  client.peer = server
  server.peer = client
  return [client, server]
}

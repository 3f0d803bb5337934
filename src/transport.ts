/** Raw byte pipe to the server, implemented by SocketStream. */
export interface ByteStream {
  write(data: Buffer): void
  read(length: number): Promise<Buffer>
}

/**
 * Carries framed packet bytes between the packet channel and the socket.
 * Chosen once after the handshake: plain, or wrapped in compressed frames.
 */
export interface PacketTransport {
  readonly compressed: boolean
  write(data: Buffer): void
  read(length: number): Promise<Buffer>
  resetSequence(): void
}

export class PlainTransport implements PacketTransport {
  readonly compressed = false

  constructor(private readonly stream: ByteStream) {}

  write(data: Buffer) {
    this.stream.write(data)
  }

  read(length: number) {
    return this.stream.read(length)
  }

  resetSequence() {}
}

import { deflateSync, inflateSync } from 'node:zlib'
import { ByteQueue } from './byteQueue'
import { MysqlProtocolError } from './MysqlError'
import { MAX_PACKET_LENGTH } from './packetChannel'
import { ByteStream, PacketTransport } from './transport'

// Below this size deflate costs more than it saves; such frames go out raw.
export const MIN_COMPRESS_LENGTH = 50
const HEADER_LENGTH = 7

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_basic_compression_packet.html
//
// | compressed length(3) | sequence id(1) | uncompressed length(3) | body |
//
// uncompressed length 0 means the body was sent as is.
export class CompressedTransport implements PacketTransport {
  readonly compressed = true
  sequenceId = 0
  private inflated = new ByteQueue()

  constructor(
    private readonly stream: ByteStream,
    private readonly maxFrameLength = MAX_PACKET_LENGTH
  ) {}

  resetSequence() {
    this.sequenceId = 0
  }

  write(data: Buffer) {
    for (let offset = 0; offset < data.length; offset += this.maxFrameLength) {
      this.stream.write(
        this.encodeFrame(data.subarray(offset, offset + this.maxFrameLength))
      )
    }
  }

  async read(length: number): Promise<Buffer> {
    while (this.inflated.length < length) {
      this.inflated.push(await this.readFrame())
    }
    return this.inflated.take(length)
  }

  private encodeFrame(chunk: Buffer) {
    let body = chunk
    let uncompressedLength = 0

    if (chunk.length >= MIN_COMPRESS_LENGTH) {
      const deflated = deflateSync(chunk)
      if (deflated.length < chunk.length) {
        body = deflated
        uncompressedLength = chunk.length
      }
    }

    const header = Buffer.allocUnsafe(HEADER_LENGTH)
    header.writeUIntLE(body.length, 0, 3)
    header[3] = this.sequenceId
    header.writeUIntLE(uncompressedLength, 4, 3)
    this.sequenceId = (this.sequenceId + 1) % 256

    return Buffer.concat([header, body])
  }

  private async readFrame(): Promise<Buffer> {
    const header = await this.stream.read(HEADER_LENGTH)
    const compressedLength = header.readUIntLE(0, 3)
    const sequenceId = header[3]
    const uncompressedLength = header.readUIntLE(4, 3)

    if (sequenceId !== this.sequenceId) {
      throw new MysqlProtocolError(
        `Got compressed packets out of order. Expected ${this.sequenceId} but received ${sequenceId}`,
        'PROTOCOL_PACKETS_OUT_OF_ORDER'
      )
    }
    this.sequenceId = (this.sequenceId + 1) % 256

    const body = await this.stream.read(compressedLength)
    if (uncompressedLength === 0) {
      return body
    }

    let data: Buffer
    try {
      data = inflateSync(body)
    } catch (err) {
      const error = new MysqlProtocolError(
        'Could not inflate compressed packet',
        'PROTOCOL_BAD_COMPRESSED_FRAME'
      )
      if (err instanceof Error) error.cause = err
      throw error
    }

    if (data.length !== uncompressedLength) {
      throw new MysqlProtocolError(
        `Compressed packet inflated to ${data.length} bytes, header announced ${uncompressedLength}`,
        'PROTOCOL_BAD_COMPRESSED_FRAME'
      )
    }
    return data
  }
}

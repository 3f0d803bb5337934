import { MysqlProtocolError } from './MysqlError'
import { Packet } from './packet'
import { PacketTransport } from './transport'

export const MAX_PACKET_LENGTH = 0xffffff
const HEADER_LENGTH = 4

/**
 * Splits a payload into physical frames: 3 byte length + 1 byte sequence id.
 * A payload ending on a frame boundary gets a trailing empty frame so the
 * reader knows nothing more follows.
 */
export function encodeFrames(
  payload: Buffer,
  sequenceId: number,
  maxPacketLength = MAX_PACKET_LENGTH
) {
  const frameCount = Math.floor(payload.length / maxPacketLength) + 1
  const out = Buffer.allocUnsafe(payload.length + frameCount * HEADER_LENGTH)
  let offset = 0
  let written = 0

  for (let i = 0; i < frameCount; i++) {
    const chunk = payload.subarray(offset, offset + maxPacketLength)
    out.writeUIntLE(chunk.length, written, 3)
    out[written + 3] = sequenceId
    chunk.copy(out, written + HEADER_LENGTH)

    written += HEADER_LENGTH + chunk.length
    offset += chunk.length
    sequenceId = (sequenceId + 1) % 256
  }

  return { bytes: out, frameCount, nextSequenceId: sequenceId }
}

export class PacketChannel {
  sequenceId = 0

  constructor(
    private transport: PacketTransport,
    readonly maxPacketLength = MAX_PACKET_LENGTH
  ) {}

  get compressed() {
    return this.transport.compressed
  }

  useTransport(transport: PacketTransport) {
    this.transport = transport
  }

  resetSequenceId() {
    this.sequenceId = 0
    this.transport.resetSequence()
  }

  private bumpSequenceId(numPackets: number) {
    this.sequenceId += numPackets
    this.sequenceId %= 256
  }

  writePacket(packet: Packet) {
    const { bytes, frameCount } = encodeFrames(
      packet.payload(),
      this.sequenceId,
      this.maxPacketLength
    )
    packet.sequenceId = this.sequenceId
    packet.numPackets = frameCount
    this.bumpSequenceId(frameCount)
    this.transport.write(bytes)
  }

  async readPacket(): Promise<Packet> {
    const chunks: Buffer[] = []
    const firstSequenceId = this.sequenceId
    let numPackets = 0
    let length: number

    do {
      const header = await this.transport.read(HEADER_LENGTH)
      length = header.readUIntLE(0, 3)
      const sequenceId = header[3]

      if (sequenceId !== this.sequenceId) {
        throw new MysqlProtocolError(
          `Got packets out of order. Expected ${this.sequenceId} but received ${sequenceId}`,
          'PROTOCOL_PACKETS_OUT_OF_ORDER'
        )
      }
      this.bumpSequenceId(1)
      numPackets++

      chunks.push(await this.transport.read(length))
    } while (length === this.maxPacketLength)

    const payload = chunks.length === 1 ? chunks[0] : Buffer.concat(chunks)
    const packet = new Packet(firstSequenceId, payload)
    packet.numPackets = numPackets
    return packet
  }
}

import { randomBytes } from 'node:crypto'
import { deflateSync } from 'node:zlib'
import { CompressedTransport } from '../src/compressedTransport'
import { Packet } from '../src/packet'
import { PacketChannel } from '../src/packetChannel'
import { MemoryStream } from './memoryStream'

describe('CompressedTransport', () => {
  it('sends short payloads uncompressed', () => {
    const stream = new MemoryStream()
    new CompressedTransport(stream).write(Buffer.from('hello'))

    expect(stream.all).toEqual(
      Buffer.concat([
        Buffer.from([5, 0, 0, 0, 0, 0, 0]),
        Buffer.from('hello'),
      ])
    )
  })

  it('deflates payloads of 50 bytes and more', async () => {
    const stream = new MemoryStream()
    const data = Buffer.alloc(1000, 'a')
    new CompressedTransport(stream).write(data)

    const header = stream.written[0]
    expect(header.readUIntLE(4, 3)).toBe(1000)
    expect(header.readUIntLE(0, 3)).toBeLessThan(1000)

    expect(await new CompressedTransport(stream).read(1000)).toEqual(data)
  })

  it('keeps a payload raw when deflate does not shrink it', () => {
    const stream = new MemoryStream()
    const data = randomBytes(64)
    new CompressedTransport(stream).write(data)

    expect(stream.all.readUIntLE(0, 3)).toBe(64)
    expect(stream.all.readUIntLE(4, 3)).toBe(0)
    expect(stream.all.subarray(7)).toEqual(data)
  })

  it('reads across frame boundaries', async () => {
    const stream = new MemoryStream()
    const writer = new CompressedTransport(stream, 8)
    writer.write(Buffer.from('0123456789abcdefghij'))

    expect(stream.written.map(frame => frame[3])).toEqual([0, 1, 2])
    expect(writer.sequenceId).toBe(3)

    const reader = new CompressedTransport(stream)
    expect((await reader.read(5)).toString()).toBe('01234')
    expect((await reader.read(15)).toString()).toBe('56789abcdefghij')
  })

  it('rejects frames out of order', async () => {
    const stream = new MemoryStream()
    stream.write(Buffer.from([1, 0, 0, 4, 0, 0, 0, 0x61]))

    await expect(new CompressedTransport(stream).read(1)).rejects.toMatchObject(
      { code: 'PROTOCOL_PACKETS_OUT_OF_ORDER' }
    )
  })

  it('rejects a body that does not inflate', async () => {
    const stream = new MemoryStream()
    stream.write(Buffer.from([3, 0, 0, 0, 10, 0, 0, 1, 2, 3]))

    await expect(new CompressedTransport(stream).read(1)).rejects.toMatchObject(
      { code: 'PROTOCOL_BAD_COMPRESSED_FRAME' }
    )
  })

  it('rejects a body whose size differs from the header', async () => {
    const body = deflateSync(Buffer.alloc(20, 'b'))
    const header = Buffer.alloc(7)
    header.writeUIntLE(body.length, 0, 3)
    header.writeUIntLE(30, 4, 3)
    const stream = new MemoryStream()
    stream.write(Buffer.concat([header, body]))

    await expect(new CompressedTransport(stream).read(1)).rejects.toMatchObject(
      { code: 'PROTOCOL_BAD_COMPRESSED_FRAME' }
    )
  })

  it('carries framed packets', async () => {
    const stream = new MemoryStream()
    const writer = new PacketChannel(new CompressedTransport(stream))
    const reader = new PacketChannel(new CompressedTransport(stream))

    const packet = Packet.alloc('test')
    packet.writeString('x'.repeat(300), 'utf8')
    writer.writePacket(packet)

    expect(writer.compressed).toBe(true)
    expect((await reader.readPacket()).payload().toString()).toBe(
      'x'.repeat(300)
    )
  })
})

import { MysqlProtocolError } from './MysqlError'
import { decodeString, encodeString } from './stringParser'

const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER)
const MIN_SAFE_BIGINT = BigInt(Number.MIN_SAFE_INTEGER)
const DESCRIBE_MAX_BYTES = 256

/** A number while the value is exact as one, otherwise the bigint. */
export function narrowBigInt(value: bigint): number | bigint {
  if (value > MAX_SAFE_BIGINT || value < MIN_SAFE_BIGINT) {
    return value
  }
  return Number(value)
}

/**
 * One logical packet payload (frame headers already stripped) with a cursor.
 *
 * Packets read from the server are consumed with the read* methods. Packets
 * built by the client start empty and grow as the write* methods append to
 * them; `payload()` returns what has been written so far.
 */
export class Packet {
  sequenceId: number
  numPackets: number
  buffer: Buffer
  offset: number
  end: number
  _name: string

  constructor(id: number, buffer: Buffer, end = buffer.length) {
    this.sequenceId = id
    this.numPackets = 1
    this.buffer = buffer
    this.offset = 0
    this.end = end
    this._name = ''
  }

  static alloc(name: string, capacity = 64) {
    const packet = new Packet(0, Buffer.alloc(capacity), 0)
    packet._name = name
    return packet
  }

  // ==============================
  // readers
  // ==============================
  reset() {
    this.offset = 0
  }

  length() {
    return this.end
  }

  payload() {
    return this.buffer.subarray(0, this.end)
  }

  haveMoreData() {
    return this.end > this.offset
  }

  skip(num: number) {
    this.need(num)
    this.offset += num
  }

  private need(num: number) {
    if (this.offset + num > this.end) {
      throw new MysqlProtocolError(
        `Tried to read ${num} byte(s) at offset ${this.offset} of a ${this.end} byte ${this._name || 'packet'}`,
        'PROTOCOL_PACKET_OVERRUN'
      )
    }
  }

  readInt8() {
    this.need(1)
    return this.buffer[this.offset++]
  }

  readInt16() {
    this.need(2)
    this.offset += 2
    return this.buffer.readUInt16LE(this.offset - 2)
  }

  readInt24() {
    this.need(3)
    this.offset += 3
    return this.buffer.readUIntLE(this.offset - 3, 3)
  }

  readInt32() {
    this.need(4)
    this.offset += 4
    return this.buffer.readUInt32LE(this.offset - 4)
  }

  readInt64() {
    this.need(8)
    this.offset += 8
    return this.buffer.readBigUInt64LE(this.offset - 8)
  }

  readLengthCodedNumber(): number | null {
    const byte1 = this.readInt8()
    if (byte1 < 0xfb) {
      return byte1
    }
    return this.readLengthCodedNumberExt(byte1)
  }

  private readLengthCodedNumberExt(tag: number): number | null {
    if (tag === 0xfb) {
      return null
    }
    if (tag === 0xfc) {
      return this.readInt16()
    }
    if (tag === 0xfd) {
      return this.readInt24()
    }
    if (tag === 0xfe) {
      const value = this.readInt64()
      if (value > MAX_SAFE_BIGINT) {
        throw new MysqlProtocolError(
          `Length-encoded integer ${value} does not fit in a number`,
          'PROTOCOL_NUMBER_OVERFLOW'
        )
      }
      return Number(value)
    }
    throw invalidLengthPrefix(tag)
  }

  /** Exact form of readLengthCodedNumber, for values that may pass 2^53. */
  readLengthCodedBigInt(): bigint | null {
    const tag = this.readInt8()
    if (tag < 0xfb) {
      return BigInt(tag)
    }
    if (tag === 0xfe) {
      return this.readInt64()
    }
    const value = this.readLengthCodedNumberExt(tag)
    return value === null ? null : BigInt(value)
  }

  readBuffer(len?: number): Buffer {
    if (typeof len === 'undefined') {
      len = this.end - this.offset
    }
    this.need(len)
    this.offset += len
    return this.buffer.subarray(this.offset - len, this.offset)
  }

  readLengthCodedBuffer(): Buffer | null {
    const len = this.readLengthCodedNumber()
    if (len === null) {
      return null
    }
    return this.readBuffer(len)
  }

  readLengthCodedString(encoding: string): string | null {
    const len = this.readLengthCodedNumber()
    if (len === null) {
      return null
    }
    return this.readString(len, encoding)
  }

  readNullTerminatedString(encoding: string): string {
    const start = this.offset
    const end = this.buffer.indexOf(0, start)
    if (end === -1 || end >= this.end) {
      throw new MysqlProtocolError(
        `Missing string terminator after offset ${start} of ${this._name || 'packet'}`,
        'PROTOCOL_PACKET_OVERRUN'
      )
    }
    this.offset = end + 1
    return decodeString(this.buffer, encoding, start, end)
  }

  readString(len: number | undefined, encoding: string): string {
    if (typeof len === 'undefined') {
      len = this.end - this.offset
    }
    this.need(len)
    this.offset += len
    return decodeString(this.buffer, encoding, this.offset - len, this.offset)
  }

  peekByte() {
    return this.offset < this.end ? this.buffer[this.offset] : -1
  }

  isError() {
    return this.peekByte() === 0xff
  }

  isEOF() {
    return this.peekByte() === 0xfe && this.length() < 9
  }

  // A row whose first column is an empty string also starts with 0x00, so
  // only use this where no row can arrive (command replies, result headers).
  isOK() {
    return (this.peekByte() === 0x00 && this.length() >= 7) || this.isEOF()
  }

  type() {
    if (this.isEOF()) {
      return 'EOF'
    }
    if (this.isError()) {
      return 'Error'
    }
    if (this.isOK()) {
      return 'OK'
    }
    return ''
  }

  describe() {
    const shown = this.buffer.subarray(0, Math.min(this.end, DESCRIBE_MAX_BYTES))
    const more = this.end > DESCRIBE_MAX_BYTES ? '...' : ''
    return `${this.type() || 'Data'} packet #${this.sequenceId} (${this.end} bytes): ${shown.toString('hex')}${more}`
  }

  // ==============================
  // writers
  // ==============================
  private ensureCapacity(num: number) {
    const required = this.offset + num
    if (required <= this.buffer.length) {
      return
    }
    let size = Math.max(this.buffer.length * 2, 64)
    while (size < required) {
      size *= 2
    }
    const grown = Buffer.alloc(size)
    this.buffer.copy(grown, 0, 0, this.end)
    this.buffer = grown
  }

  private advance(num: number) {
    this.offset += num
    if (this.offset > this.end) {
      this.end = this.offset
    }
  }

  writeInt8(n: number) {
    this.ensureCapacity(1)
    this.buffer.writeUInt8(n, this.offset)
    this.advance(1)
  }

  writeInt16(n: number) {
    this.ensureCapacity(2)
    this.buffer.writeUInt16LE(n, this.offset)
    this.advance(2)
  }

  writeInt24(n: number) {
    this.ensureCapacity(3)
    this.buffer.writeUIntLE(n, this.offset, 3)
    this.advance(3)
  }

  writeInt32(n: number) {
    this.ensureCapacity(4)
    this.buffer.writeUInt32LE(n >>> 0, this.offset)
    this.advance(4)
  }

  writeInt64(n: bigint) {
    this.ensureCapacity(8)
    this.buffer.writeBigUInt64LE(n, this.offset)
    this.advance(8)
  }

  writeZeros(num: number) {
    this.ensureCapacity(num)
    this.buffer.fill(0, this.offset, this.offset + num)
    this.advance(num)
  }

  writeBuffer(b: Buffer) {
    this.ensureCapacity(b.length)
    b.copy(this.buffer, this.offset)
    this.advance(b.length)
  }

  writeNullTerminatedString(s: string, encoding: string) {
    this.writeBuffer(encodeString(s, encoding))
    this.writeInt8(0)
  }

  writeString(s: string, encoding: string) {
    this.writeBuffer(encodeString(s, encoding))
  }

  writeLengthCodedString(s: string | null, encoding: string) {
    if (s === null) {
      this.writeInt8(0xfb)
      return
    }
    this.writeLengthCodedBuffer(encodeString(s, encoding))
  }

  writeLengthCodedBuffer(b: Buffer) {
    this.writeLengthCodedNumber(b.length)
    this.writeBuffer(b)
  }

  writeLengthCodedNumber(n: number | bigint | null) {
    if (n === null) {
      return this.writeInt8(0xfb)
    }
    if (typeof n === 'bigint') {
      if (n > MAX_SAFE_BIGINT) {
        this.writeInt8(0xfe)
        return this.writeInt64(n)
      }
      n = Number(n)
    }
    if (n < 0xfb) {
      return this.writeInt8(n)
    }
    if (n <= 0xffff) {
      this.writeInt8(0xfc)
      return this.writeInt16(n)
    }
    if (n <= 0xffffff) {
      this.writeInt8(0xfd)
      return this.writeInt24(n)
    }
    this.writeInt8(0xfe)
    this.writeInt64(BigInt(n))
  }

  static lengthCodedNumberLength(n: number | bigint) {
    const value = Number(n)
    if (value < 0xfb) {
      return 1
    }
    if (value <= 0xffff) {
      return 3
    }
    if (value <= 0xffffff) {
      return 4
    }
    return 9
  }
}

function invalidLengthPrefix(tag: number) {
  return new MysqlProtocolError(
    `Invalid length-encoded integer prefix 0x${tag.toString(16)}`,
    'PROTOCOL_INVALID_LENGTH_PREFIX'
  )
}

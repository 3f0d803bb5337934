/** FIFO of received chunks that hands out exact byte counts. */
export class ByteQueue {
  private chunks: Buffer[] = []
  private size = 0

  get length() {
    return this.size
  }

  push(chunk: Buffer) {
    if (chunk.length === 0) {
      return
    }
    this.chunks.push(chunk)
    this.size += chunk.length
  }

  take(length: number): Buffer {
    if (length > this.size) {
      throw new RangeError(`Cannot take ${length} bytes, only ${this.size} queued`)
    }
    if (length === 0) {
      return Buffer.alloc(0)
    }
    this.size -= length

    const first = this.chunks[0]
    if (first.length >= length) {
      if (first.length === length) {
        this.chunks.shift()
      } else {
        this.chunks[0] = first.subarray(length)
      }
      return first.subarray(0, length)
    }

    const out = Buffer.allocUnsafe(length)
    let copied = 0
    while (copied < length) {
      const chunk = this.chunks[0]
      const n = Math.min(chunk.length, length - copied)
      chunk.copy(out, copied, 0, n)
      copied += n
      if (n === chunk.length) {
        this.chunks.shift()
      } else {
        this.chunks[0] = chunk.subarray(n)
      }
    }
    return out
  }
}

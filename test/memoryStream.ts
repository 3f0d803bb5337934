import { ByteQueue } from '../src/byteQueue'
import { ByteStream } from '../src/transport'

/** Loopback byte stream: reads return what was written earlier. */
export class MemoryStream implements ByteStream {
  readonly written: Buffer[] = []
  private queue = new ByteQueue()

  write(data: Buffer) {
    this.written.push(Buffer.from(data))
    this.queue.push(Buffer.from(data))
  }

  read(length: number) {
    return Promise.resolve().then(() => this.queue.take(length))
  }

  get all() {
    return Buffer.concat(this.written)
  }
}

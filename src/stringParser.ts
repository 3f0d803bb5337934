// MySQL names a few encodings differently from Node
const ENCODING_ALIASES: Record<string, BufferEncoding> = {
  utf8mb4: 'utf8',
  utf8mb3: 'utf8',
  cesu8: 'utf8',
  binary: 'latin1',
}

export function toBufferEncoding(encoding: string): BufferEncoding {
  const alias = ENCODING_ALIASES[encoding.toLowerCase()]
  if (alias) return alias

  if (Buffer.isEncoding(encoding)) {
    return encoding
  }

  console.error('Unsupported encoding', encoding, 'using latin')

  return 'latin1'
}

export function decodeString(
  buffer: Buffer,
  encoding: string,
  start: number,
  end: number
) {
  if (encoding === 'utf8') {
    return buffer.toString('utf8', start, end)
  }

  return buffer.toString(toBufferEncoding(encoding), start, end)
}

export function encodeString(string: string, encoding: string) {
  return Buffer.from(string, toBufferEncoding(encoding))
}

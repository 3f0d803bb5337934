// Collation ids sent in the greeting and the handshake response, mapped to
// the Node encoding used for text in that collation.
export const CharsetToEncoding: Record<number, string> = {
  8: 'latin1', // latin1_swedish_ci
  11: 'ascii', // ascii_general_ci
  33: 'utf8', // utf8mb3_general_ci
  45: 'utf8', // utf8mb4_general_ci
  46: 'utf8', // utf8mb4_bin
  47: 'latin1', // latin1_bin
  63: 'binary',
  83: 'utf8', // utf8mb3_bin
  224: 'utf8', // utf8mb4_unicode_ci
  255: 'utf8', // utf8mb4_0900_ai_ci
}

export const EncodingToCharset: Record<string, number> = {
  utf8: 33,
  utf8mb3: 33,
  utf8mb4: 45,
  latin1: 8,
  ascii: 11,
  binary: 63,
}

export const DEFAULT_CHARSET = 33

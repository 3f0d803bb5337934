const CHARS_GLOBAL_REGEXP = /[\0\b\t\n\r\x1a"'\\]/g

const CHARS_ESCAPE_MAP: Record<string, string> = {
  '\0': '\\0',
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
  '\x1a': '\\Z',
  '"': '\\"',
  "'": "\\'",
  '\\': '\\\\',
}

/** `name` or `table`.`field`, with embedded backticks doubled. */
export function quoteIdentifier(name: string, field?: string): string {
  const quoted = '`' + name.replace(/`/g, '``') + '`'
  if (field === undefined) {
    return quoted
  }
  return quoted + '.' + quoteIdentifier(field)
}

export function quoteString(value: string): string {
  return (
    "'" +
    value.replace(CHARS_GLOBAL_REGEXP, char => CHARS_ESCAPE_MAP[char] ?? char) +
    "'"
  )
}

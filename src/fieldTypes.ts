import * as Types from './constants/types'

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_com_query_response_text_resultset_column_definition.html

export type InternalType =
  | 'int32'
  | 'int64'
  | 'year'
  | 'float'
  | 'double'
  | 'decimal'
  | 'date'
  | 'datetime'
  | 'time'
  | 'text'
  | 'binary'
  | 'json'
  | 'bit'
  | 'null'

/** JS value family a column converts to. */
export type ValueType = 'number' | 'bigint' | 'string' | 'date' | 'buffer' | 'null'

export type ResultField = Readonly<{
  catalog: string
  schema: string
  table: string
  originalTable: string
  name: string
  originalName: string
  characterSet: number
  length: number
  dataType: number
  flags: number
  decimals: number
  internalType: InternalType
  valueType: ValueType
}>

// string-like columns are text unless the binary collation flag is set
const STRING_TYPE = { text: 'text', binary: 'binary' } as const

const WireTypeToInternal: Readonly<
  Record<number, InternalType | typeof STRING_TYPE>
> = {
  [Types.MYSQL_TYPE_TINY]: 'int32',
  [Types.MYSQL_TYPE_SHORT]: 'int32',
  [Types.MYSQL_TYPE_INT24]: 'int32',
  [Types.MYSQL_TYPE_LONG]: 'int32',
  [Types.MYSQL_TYPE_LONGLONG]: 'int64',
  [Types.MYSQL_TYPE_YEAR]: 'year',
  [Types.MYSQL_TYPE_FLOAT]: 'float',
  [Types.MYSQL_TYPE_DOUBLE]: 'double',
  [Types.MYSQL_TYPE_DECIMAL]: 'decimal',
  [Types.MYSQL_TYPE_NEWDECIMAL]: 'decimal',
  [Types.MYSQL_TYPE_DATE]: 'date',
  [Types.MYSQL_TYPE_NEWDATE]: 'date',
  [Types.MYSQL_TYPE_DATETIME]: 'datetime',
  [Types.MYSQL_TYPE_TIMESTAMP]: 'datetime',
  [Types.MYSQL_TYPE_TIME]: 'time',
  [Types.MYSQL_TYPE_VARCHAR]: STRING_TYPE,
  [Types.MYSQL_TYPE_VAR_STRING]: STRING_TYPE,
  [Types.MYSQL_TYPE_STRING]: STRING_TYPE,
  [Types.MYSQL_TYPE_TINY_BLOB]: STRING_TYPE,
  [Types.MYSQL_TYPE_MEDIUM_BLOB]: STRING_TYPE,
  [Types.MYSQL_TYPE_LONG_BLOB]: STRING_TYPE,
  [Types.MYSQL_TYPE_BLOB]: STRING_TYPE,
  [Types.MYSQL_TYPE_ENUM]: 'text',
  [Types.MYSQL_TYPE_SET]: 'text',
  [Types.MYSQL_TYPE_GEOMETRY]: 'binary',
  [Types.MYSQL_TYPE_JSON]: 'json',
  [Types.MYSQL_TYPE_BIT]: 'bit',
  [Types.MYSQL_TYPE_NULL]: 'null',
}

const InternalToValueType: Readonly<Record<InternalType, ValueType>> = {
  int32: 'number',
  int64: 'bigint',
  year: 'number',
  float: 'number',
  double: 'number',
  decimal: 'string',
  date: 'date',
  datetime: 'date',
  time: 'string',
  text: 'string',
  binary: 'buffer',
  json: 'string',
  bit: 'buffer',
  null: 'null',
}

export function toInternalType(dataType: number, flags: number): InternalType {
  const mapped = WireTypeToInternal[dataType]
  if (mapped === undefined) {
    // unknown wire types are handed back as raw bytes
    return 'binary'
  }
  if (typeof mapped === 'string') {
    return mapped
  }
  return flags & Types.BINARY_FLAG ? mapped.binary : mapped.text
}

export function toValueType(internalType: InternalType): ValueType {
  return InternalToValueType[internalType]
}

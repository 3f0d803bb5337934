import { ResultField, toInternalType, toValueType } from '../fieldTypes'
import { Packet } from '../packet'

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_com_query_response_text_resultset_column_definition.html

export class ColumnDefinitionPacket {
  static fromPacket(packet: Packet, encoding: string): ResultField {
    packet._name = 'ColumnDefinition'
    const catalog = packet.readLengthCodedString(encoding) ?? ''
    const schema = packet.readLengthCodedString(encoding) ?? ''
    const table = packet.readLengthCodedString(encoding) ?? ''
    const originalTable = packet.readLengthCodedString(encoding) ?? ''
    const name = packet.readLengthCodedString(encoding) ?? ''
    const originalName = packet.readLengthCodedString(encoding) ?? ''

    packet.readLengthCodedNumber() // length of the following fields (always 0x0c)

    const characterSet = packet.readInt16()
    const length = packet.readInt32()
    const dataType = packet.readInt8()
    const flags = packet.readInt16()
    const decimals = packet.readInt8()

    const internalType = toInternalType(dataType, flags)

    return {
      catalog,
      schema,
      table,
      originalTable,
      name,
      originalName,
      characterSet,
      length,
      dataType,
      flags,
      decimals,
      internalType,
      valueType: toValueType(internalType),
    }
  }
}

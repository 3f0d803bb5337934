import { COM_QUERY } from '../constants/commands'
import { Conn } from '../ConnectionType'
import { MysqlProtocolError } from '../MysqlError'
import { Packet } from '../packet'
import { ColumnDefinitionPacket } from '../packets/ColumnDefinitionPacket'
import { CommandPacket } from '../packets/commandPacket'
import { hasMoreResults, OkPacket } from '../packets/okPacket'
import { ResultSet } from '../resultSet'
import { Command, CommandHandlePacketFn } from './command'

// https://dev.mysql.com/doc/dev/mysql-server/latest/page_protocol_com_query.html
export class QueryCommand implements Command<ResultSet[] | null> {
  handlePacket: CommandHandlePacketFn = null
  _commandName = 'Query'
  private _fieldCount = 0
  private _resultSets: ResultSet[] = []
  private _current: ResultSet | null = null

  constructor(
    public readonly sql: string,
    private readonly capacity = 16
  ) {}

  start(connection: Conn): CommandHandlePacketFn {
    if (connection.config.debug) {
      // eslint-disable-next-line
      console.log('        Sending query command: %s', this.sql)
    }

    const cmdPacket = new CommandPacket(
      COM_QUERY,
      this.sql,
      connection.clientEncoding
    )
    connection.writePacket(cmdPacket.toPacket())

    return { name: 'resultsetHeader', fn: this.resultsetHeader }
  }

  /** Every result set in order, or null when no statement produced one. */
  result() {
    return this._resultSets.length === 0 ? null : this._resultSets
  }

  private resultsetHeader(
    packet: Packet,
    connection: Conn
  ): CommandHandlePacketFn {
    if (packet.isOK()) {
      return this.doneInsert(packet, connection)
    }

    const fieldCount = packet.readLengthCodedNumber()
    if (fieldCount === null) {
      throw new MysqlProtocolError(
        'LOAD DATA LOCAL INFILE is not supported',
        'PROTOCOL_LOCAL_INFILE_UNSUPPORTED'
      )
    }
    if (fieldCount === 0) {
      throw new MysqlProtocolError(
        `Unexpected result set header: ${packet.describe()}`,
        'PROTOCOL_UNEXPECTED_PACKET'
      )
    }

    if (connection.config.debug) {
      // eslint-disable-next-line
      console.log(
        `        Resultset header received, expecting ${fieldCount} column definition packets`
      )
    }

    this._fieldCount = fieldCount
    this._current = new ResultSet(
      fieldCount,
      connection.clientEncoding,
      this.capacity
    )
    connection.transition('fetching')

    return { name: 'readFields', fn: this.readField }
  }

  private readField(packet: Packet, connection: Conn): CommandHandlePacketFn {
    const resultSet = this.currentResultSet()
    if (packet.isEOF()) {
      throw new MysqlProtocolError(
        `Expected ${this._fieldCount} column definitions, got ${resultSet.fields.length}`,
        'PROTOCOL_UNEXPECTED_PACKET'
      )
    }

    const field = ColumnDefinitionPacket.fromPacket(
      packet,
      connection.clientEncoding
    )
    resultSet.addField(field)

    if (connection.config.debug) {
      /* eslint-disable no-console */
      console.log('        Column definition:')
      console.log(`          name: ${field.name}`)
      console.log(`          type: ${field.dataType} (${field.internalType})`)
      console.log(`         flags: ${field.flags}`)
      /* eslint-enable no-console */
    }

    // last field received
    if (resultSet.fields.length === this._fieldCount) {
      return { name: 'eof', fn: this.fieldsEOF }
    }

    return { name: 'readMoreFields', fn: this.readField }
  }

  private fieldsEOF(packet: Packet, connection: Conn): CommandHandlePacketFn {
    if (!packet.isEOF()) {
      throw new MysqlProtocolError(
        `Expected EOF after column definitions, got ${packet.describe()}`,
        'PROTOCOL_UNEXPECTED_PACKET'
      )
    }
    connection.setResult(OkPacket.fromPacket(packet, connection.clientEncoding))
    return { name: 'readRow', fn: this.row }
  }

  private row(packet: Packet, connection: Conn): CommandHandlePacketFn {
    const resultSet = this.currentResultSet()

    // rows never start with 0xfe unless they are at least 9 bytes long
    if (packet.isEOF()) {
      const result = OkPacket.fromPacket(packet, connection.clientEncoding)
      connection.setResult(result)
      this._resultSets.push(resultSet)
      this._current = null

      if (hasMoreResults(result)) {
        connection.transition('executing')
        return { name: 'readNextResultsetHeader', fn: this.resultsetHeader }
      }
      return null
    }

    resultSet.addRow(packet.payload())

    return { name: 'readNextRow', fn: this.row }
  }

  private doneInsert(packet: Packet, connection: Conn): CommandHandlePacketFn {
    const result = OkPacket.fromPacket(packet, connection.clientEncoding)
    connection.setResult(result)

    if (hasMoreResults(result)) {
      return { name: 'header', fn: this.resultsetHeader }
    }
    return null
  }

  private currentResultSet() {
    if (this._current === null) {
      throw new MysqlProtocolError(
        'Received a row outside of a result set',
        'PROTOCOL_UNEXPECTED_PACKET'
      )
    }
    return this._current
  }
}

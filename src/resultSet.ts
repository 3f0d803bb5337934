import { ResultField } from './fieldTypes'
import { MysqlUsageError } from './MysqlError'
import { Packet } from './packet'
import { decodeString } from './stringParser'
import { ColumnValue, ParsedRowType, convertTextValue } from './textParser'

/**
 * Column definitions plus the raw text-protocol rows of one result set.
 * Cells are only split and converted when asked for.
 */
export class ResultSet {
  readonly fields: ResultField[] = []
  private rows: Buffer[]
  private count = 0
  private cachedRowIndex = -1
  private cachedCells: (Buffer | null)[] = []

  constructor(
    readonly columnCount: number,
    private readonly encoding: string,
    capacity = 16
  ) {
    // only a hint, the store still grows past it
    this.rows = new Array<Buffer>(Math.max(0, capacity))
  }

  get rowCount() {
    return this.count
  }

  addField(field: ResultField) {
    this.fields.push(field)
  }

  addRow(payload: Buffer) {
    // the packet buffer may be reused, keep a copy
    const row = Buffer.from(payload)
    if (this.count < this.rows.length) {
      this.rows[this.count] = row
    } else {
      this.rows.push(row)
    }
    this.count++
  }

  getOrdinal(name: string) {
    const index = this.fields.findIndex(f => f.name === name)
    if (index === -1) {
      throw new MysqlUsageError(
        `No column named ${name}`,
        'RESULT_INDEX_OUT_OF_RANGE'
      )
    }
    return index
  }

  isNull(row: number, column: number) {
    return this.getRaw(row, column) === null
  }

  getRaw(row: number, column: number): Buffer | null {
    return this.cells(row, column)[column]
  }

  getString(row: number, column: number): string | null {
    const raw = this.getRaw(row, column)
    if (raw === null) {
      return null
    }
    return decodeString(raw, this.encoding, 0, raw.length)
  }

  getValue(row: number, column: number): ColumnValue {
    return convertTextValue(
      this.getRaw(row, column),
      this.fields[column],
      this.encoding
    )
  }

  getRow(row: number): ParsedRowType {
    const result: ParsedRowType = {}
    for (let i = 0; i < this.columnCount; i++) {
      result[this.fields[i].name] = this.getValue(row, i)
    }
    return result
  }

  toObjects(): ParsedRowType[] {
    const result: ParsedRowType[] = []
    for (let i = 0; i < this.rowCount; i++) {
      result.push(this.getRow(i))
    }
    return result
  }

  private cells(row: number, column: number) {
    if (
      row < 0 ||
      row >= this.rowCount ||
      column < 0 ||
      column >= this.columnCount
    ) {
      throw new MysqlUsageError(
        `Cell (${row}, ${column}) is outside the ${this.rowCount}x${this.columnCount} result set`,
        'RESULT_INDEX_OUT_OF_RANGE'
      )
    }
    if (row !== this.cachedRowIndex) {
      const packet = new Packet(0, this.rows[row])
      packet._name = 'Row'
      const cells: (Buffer | null)[] = []
      for (let i = 0; i < this.columnCount; i++) {
        cells.push(packet.readLengthCodedBuffer())
      }
      this.cachedCells = cells
      this.cachedRowIndex = row
    }
    return this.cachedCells
  }
}

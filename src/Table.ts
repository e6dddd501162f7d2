/**
 * A single value stored in a table cell. Readers only ever produce these shapes,
 * so writers can rely on them when serializing.
 */
export type Cell = string | number | boolean | Date | null

/** One table row keyed by column name. */
export type Row = Record<string, Cell>

/**
 * Common wrapper returned by every reader and accepted by every writer. Keeps the
 * column order separately from the row records so that a table with no rows still
 * knows its shape.
 */
export default class Table {
  readonly columns: readonly string[]
  private readonly _rows: Row[]

  /**
   * @param columns Column names in output order. Duplicates are not allowed since
   * rows are keyed by name.
   * @param rows Row records, copied on the way in. Keys outside `columns` are
   * ignored on output, missing keys read as `null`.
   */
  constructor(columns: readonly string[], rows: Row[] = []) {
    const seen = new Set<string>()
    for (const column of columns) {
      if (seen.has(column)) throw new TypeError(`Duplicate column name '${column}'`)
      seen.add(column)
    }
    this.columns = [...columns]
    this._rows = rows.map((row) => ({ ...row }))
  }

  /**
   * Builds a table from plain records. Columns are collected in the order they
   * are first seen across all records.
   */
  static fromRecords(records: Row[]): Table {
    const columns: string[] = []
    const seen = new Set<string>()
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key)
          columns.push(key)
        }
      }
    }
    return new Table(columns, records)
  }

  get rowCount(): number {
    return this._rows.length
  }

  /** Rows normalized to exactly the table's columns, in column order. */
  get rows(): Row[] {
    return this._rows.map((row) => {
      const out: Row = {}
      for (const column of this.columns) out[column] = row[column] ?? null
      return out
    })
  }

  /** Values of one column from top to bottom. */
  column(name: string): Cell[] {
    if (!this.columns.includes(name)) throw new RangeError(`Unknown column '${name}'`)
    return this._rows.map((row) => row[name] ?? null)
  }

  toRecords(): Row[] {
    return this.rows
  }

  /** Row values as arrays ordered like `columns`. Handy for positional writers. */
  toArrays(): Cell[][] {
    return this._rows.map((row) => this.columns.map((column) => row[column] ?? null))
  }

  /**
   * Same columns in the same order and equal cells row by row. Dates compare by
   * timestamp, everything else strictly.
   */
  equals(other: Table): boolean {
    if (this.columns.length !== other.columns.length) return false
    if (this.columns.some((column, idx) => other.columns[idx] !== column)) return false
    if (this.rowCount !== other.rowCount) return false

    const left = this.toArrays()
    const right = other.toArrays()
    for (let i = 0; i < left.length; i++) {
      for (let j = 0; j < left[i].length; j++) {
        if (!sameCell(left[i][j], right[i][j])) return false
      }
    }
    return true
  }
}

const sameCell = (a: Cell, b: Cell): boolean => {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  return a === b
}

/**
 * Narrows a value coming out of a parser or database driver into a `Cell`.
 * BigInts are converted to numbers; anything else that is not a plain scalar is
 * rejected.
 */
export const toCell = (value: unknown): Cell => {
  if (value === null || value === undefined) return null
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value
  }
  if (typeof value === "bigint") return Number(value)
  if (value instanceof Date) return value
  throw new TypeError(`Unsupported cell value of type ${typeof value}`)
}

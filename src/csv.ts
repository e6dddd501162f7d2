import { promises as fs } from "fs"
import papaparsePkg, { type ParseError } from "papaparse"
import { DEFAULTS } from "./config.js"
import { IOFailureError } from "./errors.js"
import Table, { type Cell, type Row, toCell } from "./Table.js"
import type {
  CsvReadOptions,
  CsvWriteOptions,
  TableReader,
  TableWriter,
} from "./types/DataFormat.js"
import { assertSourceExists, ensureParentDirectory } from "./utils/common.js"
import { createLogger } from "./utils/logger.js"

const { parse, unparse } = papaparsePkg
const log = createLogger("csv")

/**
 * Missing trailing cells are read as null; every other problem papaparse reports
 * (unterminated quotes, extra fields) fails the read.
 */
const isFatal = (error: ParseError): boolean => error.code !== "TooFewFields"

const describeParseError = (error: ParseError): Error =>
  new Error(error.row === undefined ? error.message : `${error.message} (row ${error.row})`)

/**
 * Turns delimited text into a Table. Values go through papaparse's dynamic
 * typing, so numbers, booleans and ISO dates come back typed and empty fields
 * come back as null. Blank lines are rows of nulls, except for the one left by a
 * final line break.
 */
export const parseCsv = (text: string, options: CsvReadOptions = {}): Table => {
  const delimiter = options.separator ?? DEFAULTS.csv.separator
  const header = options.header ?? DEFAULTS.csv.header
  const body = text.replace(/\r?\n$|\r$/, "")

  if (header) {
    const result = parse<Record<string, unknown>>(body, {
      delimiter,
      header: true,
      dynamicTyping: true,
    })
    const fatal = result.errors.find(isFatal)
    if (fatal) throw describeParseError(fatal)

    const columns = result.meta.fields ?? []
    const rows = result.data.map((record) => {
      const row: Row = {}
      for (const column of columns) row[column] = toCell(record[column])
      return row
    })
    return new Table(columns, rows)
  }

  const result = parse<unknown[]>(body, {
    delimiter,
    header: false,
    dynamicTyping: true,
  })
  const fatal = result.errors.find(isFatal)
  if (fatal) throw describeParseError(fatal)

  const width = result.data.reduce((max, cols) => Math.max(max, cols.length), 0)
  const columns = Array.from({ length: width }, (_, idx) => `field${idx}`)
  const rows = result.data.map((cols) => {
    const row: Row = {}
    columns.forEach((column, idx) => {
      row[column] = toCell(cols[idx])
    })
    return row
  })
  return new Table(columns, rows)
}

/** Serializes a Table into delimited text, header line first unless disabled. */
export const formatCsv = (table: Table, options: CsvWriteOptions = {}): string => {
  const writeIndex = options.writeIndex ?? DEFAULTS.csv.writeIndex
  const indexLabel = options.indexLabel ?? DEFAULTS.csv.indexLabel

  const fields = writeIndex ? [indexLabel, ...table.columns] : [...table.columns]
  const data: Cell[][] = writeIndex
    ? table.toArrays().map((cols, idx) => [idx, ...cols])
    : table.toArrays()

  const delimiter = options.separator ?? DEFAULTS.csv.separator
  const header = options.header ?? DEFAULTS.csv.header

  // papaparse pads an empty data array into one blank row
  if (data.length === 0) return header ? unparse([fields], { delimiter, newline: "\n" }) : ""

  // an unquoted empty cell in a single column would leave a blank line
  if (fields.length === 1) {
    return unparse(
      { fields, data: data.map(([cell]) => [cell ?? ""]) },
      { delimiter, header, newline: "\n", quotes: (value: unknown) => value === "" },
    )
  }

  return unparse({ fields, data }, { delimiter, header, newline: "\n" })
}

/** Reads a CSV file from the filesystem. */
export class CsvReader implements TableReader<CsvReadOptions> {
  async read(source: string, options: CsvReadOptions = {}): Promise<Table> {
    await assertSourceExists(source, "CSV")

    try {
      log.info(`Reading CSV from '${source}'...`)
      const text = await fs.readFile(source, { encoding: options.encoding ?? DEFAULTS.csv.encoding })
      return parseCsv(text, options)
    } catch (e) {
      throw new IOFailureError("CSV", "read", source, e)
    }
  }
}

/**
 * Writes a Table to a CSV file, creating missing parent directories first. The
 * row index is left out unless `writeIndex` is set.
 */
export class CsvWriter implements TableWriter<CsvWriteOptions> {
  async write(table: Table, target: string, options: CsvWriteOptions = {}): Promise<void> {
    try {
      await ensureParentDirectory(target, log)
      log.info(`Writing CSV to '${target}'...`)
      await fs.writeFile(target, formatCsv(table, options), {
        encoding: options.encoding ?? DEFAULTS.csv.encoding,
      })
    } catch (e) {
      throw new IOFailureError("CSV", "write", target, e)
    }
  }
}

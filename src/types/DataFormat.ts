import type Table from "../Table.js"

/**
 * Options shared by the file-backed text formats.
 * - `encoding`: text encoding used for the file, `utf8` unless set.
 */
export interface TextFileOptions {
  encoding?: BufferEncoding
}

/**
 * - `separator`: field delimiter, a comma unless set.
 * - `header`: set to false when the first row holds data rather than column
 *   names. Columns are then named `field0`, `field1`, ...
 */
export interface CsvReadOptions extends TextFileOptions {
  separator?: string
  header?: boolean
}

/**
 * - `writeIndex`: prepend a column holding each row's position. Off by default.
 * - `indexLabel`: header of that column, empty unless set.
 * - `header`: write the column names as the first line. On by default.
 */
export interface CsvWriteOptions extends TextFileOptions {
  separator?: string
  header?: boolean
  writeIndex?: boolean
  indexLabel?: string
}

export type SqlValue = string | number | bigint | Buffer | null

/**
 * - `query`: statement whose result becomes the table. Required.
 * - `params`: positional (`?`) or named (`@name`, `:name`, `$name`) bindings.
 */
export interface SqlReadOptions {
  query?: string
  params?: SqlValue[] | Record<string, SqlValue>
}

/** What to do when the target table already exists. */
export type IfExistsPolicy = "fail" | "replace" | "append"

/**
 * - `connection`: database location the table is written to. Required.
 * - `ifExists`: collision policy, `fail` unless set.
 */
export interface SqlWriteOptions {
  connection?: string
  ifExists?: IfExistsPolicy
}

export type JsonReadOptions = TextFileOptions

/** - `indent`: spaces used to pretty-print, 2 unless set. 0 writes one line. */
export interface JsonWriteOptions extends TextFileOptions {
  indent?: number
}

/**
 * Contract every reader strategy follows. `source` is whatever locates the data
 * for the format: a file path, a connection string, a URL.
 */
export interface TableReader<O extends object = object> {
  read(source: string, options?: O): Promise<Table>
}

/**
 * Contract every writer strategy follows. `target` names where the table goes: a
 * file path, a table name.
 */
export interface TableWriter<O extends object = object> {
  write(table: Table, target: string, options?: O): Promise<void>
}

/** Registries hold classes, and build a fresh instance on every lookup. */
export type ReaderClass = new () => TableReader
export type WriterClass = new () => TableWriter

/**
 * Options accepted for each built-in format tag. Extensions can give their own
 * tags typed options by merging entries into these interfaces.
 */
export interface ReadOptionsByFormat {
  csv: CsvReadOptions
  sql: SqlReadOptions
}

export interface WriteOptionsByFormat {
  csv: CsvWriteOptions
  sql: SqlWriteOptions
}

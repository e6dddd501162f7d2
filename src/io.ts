import { CsvReader, CsvWriter } from "./csv.js"
import { getReader, getWriter, registerReader, registerWriter } from "./registry.js"
import { SqlReader, SqlWriter } from "./sql.js"
import type Table from "./Table.js"
import type { ReadOptionsByFormat, WriteOptionsByFormat } from "./types/DataFormat.js"

// Built-in formats
registerReader("csv", CsvReader)
registerWriter("csv", CsvWriter)
registerReader("sql", SqlReader)
registerWriter("sql", SqlWriter)

/**
 * Loads a table from `source` using the reader registered for `format`. Options
 * are handed to the reader untouched, and whatever the reader throws reaches the
 * caller as is.
 *
 * @param source File path, connection string or whatever the format reads from.
 * @param format Registered format tag, e.g. `csv` or `sql`.
 */
export function loadData<F extends keyof ReadOptionsByFormat>(
  source: string,
  format: F,
  options?: ReadOptionsByFormat[F],
): Promise<Table>
export function loadData(source: string, format: string, options?: object): Promise<Table>
export async function loadData(source: string, format: string, options?: object): Promise<Table> {
  return getReader(format).read(source, options)
}

/**
 * Saves `table` to `target` using the writer registered for `format`.
 *
 * @param target File path, table name or whatever the format writes to.
 * @param format Registered format tag, e.g. `csv` or `sql`.
 */
export function saveData<F extends keyof WriteOptionsByFormat>(
  table: Table,
  target: string,
  format: F,
  options?: WriteOptionsByFormat[F],
): Promise<void>
export function saveData(
  table: Table,
  target: string,
  format: string,
  options?: object,
): Promise<void>
export async function saveData(
  table: Table,
  target: string,
  format: string,
  options?: object,
): Promise<void> {
  return getWriter(format).write(table, target, options)
}

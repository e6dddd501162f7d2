import Table from "./Table.js"

/**
 * Public entrypoint for tabular-io. Importing it registers the built-in `csv`
 * and `sql` formats on the shared registry.
 *
 * Exports:
 * - `loadData` / `saveData`: resolve a format tag and delegate to its strategy.
 * - `registerReader` / `registerWriter`: add or replace a format at any time.
 * - `CsvReader`, `CsvWriter`, `SqlReader`, `SqlWriter`: built-in strategies.
 * - `JsonReader`, `JsonWriter`: records-JSON strategies, registered on request.
 * - `Table`: the value every reader returns and every writer accepts.
 */
export { loadData, saveData } from "./io.js"
export {
  FormatRegistry,
  registry,
  registerReader,
  registerWriter,
  getReader,
  getWriter,
} from "./registry.js"
export { CsvReader, CsvWriter, parseCsv, formatCsv } from "./csv.js"
export { SqlReader, SqlWriter, openSqlite, resolveLocation } from "./sql.js"
export type { SqlConnector, ConnectionMode } from "./sql.js"
export { JsonReader, JsonWriter, parseJsonRecords } from "./json.js"
export {
  TabularIOError,
  UnknownFormatError,
  SourceNotFoundError,
  MissingArgumentError,
  IOFailureError,
} from "./errors.js"
export type { Role, Operation } from "./errors.js"
export { DEFAULTS, loadConfig } from "./config.js"
export type { Config, LogLevel } from "./config.js"
export { createLogger } from "./utils/logger.js"
export type { Logger, LogSink } from "./utils/logger.js"
export type * from "./types/DataFormat.js"
export type { Cell, Row } from "./Table.js"
export { Table }

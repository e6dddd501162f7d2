import Database from "better-sqlite3"
import { DEFAULTS } from "./config.js"
import { IOFailureError, MissingArgumentError } from "./errors.js"
import Table, { type Cell, type Row, toCell } from "./Table.js"
import type {
  IfExistsPolicy,
  SqlReadOptions,
  SqlWriteOptions,
  TableReader,
  TableWriter,
} from "./types/DataFormat.js"
import { createLogger } from "./utils/logger.js"

const log = createLogger("sql")

export type ConnectionMode = "read" | "write"

/**
 * Opens a database for one operation. The strategy closes the returned
 * connection when it is done with it.
 */
export type SqlConnector = (descriptor: string, mode: ConnectionMode) => Database.Database

const MEMORY = ":memory:"

/**
 * Turns a connection descriptor into a location better-sqlite3 understands.
 * Accepts a plain file path, `:memory:`, or a `sqlite:///relative.db` /
 * `sqlite:////absolute.db` URL (`sqlite://` alone is an in-memory database).
 */
export const resolveLocation = (descriptor: string): string => {
  const match = /^([a-z][a-z0-9+.-]*):\/\/(.*)$/i.exec(descriptor)
  if (!match) return descriptor

  const [, scheme, rest] = match
  if (scheme.toLowerCase() !== "sqlite") {
    throw new Error(`Unsupported connection scheme '${scheme}'`)
  }
  if (rest === "" || rest === "/") return MEMORY
  if (!rest.startsWith("/")) throw new Error(`Malformed SQLite URL '${descriptor}'`)
  return rest.slice(1)
}

/** Default connector. Readers refuse to create a database file that is not there. */
export const openSqlite: SqlConnector = (descriptor, mode) => {
  const location = resolveLocation(descriptor)
  const mustExist = mode === "read" && location !== MEMORY && location !== ""
  return new Database(location, { fileMustExist: mustExist })
}

const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`

const POLICIES: readonly IfExistsPolicy[] = ["fail", "replace", "append"]

/** Declared SQLite type for a column, judged from its non-null values. */
const columnType = (values: Cell[]): string => {
  const present = values.filter((value) => value !== null)
  if (present.length === 0) return "TEXT"
  if (present.every((value) => typeof value === "boolean")) return "INTEGER"
  if (present.every((value) => typeof value === "number")) {
    return present.every((value) => Number.isInteger(value)) ? "INTEGER" : "REAL"
  }
  return "TEXT"
}

const toSqlValue = (cell: Cell): string | number | null => {
  if (typeof cell === "boolean") return cell ? 1 : 0
  if (cell instanceof Date) return cell.toISOString()
  return cell
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null

/**
 * Runs a query against a SQLite database and returns its result set. Needs the
 * `query` option; it is checked before any connection is opened.
 */
export class SqlReader implements TableReader<SqlReadOptions> {
  constructor(private readonly connect: SqlConnector = openSqlite) {}

  async read(source: string, options: SqlReadOptions = {}): Promise<Table> {
    const { query, params } = options
    if (typeof query !== "string" || query.trim() === "") {
      throw new MissingArgumentError("SQL", "read", "query")
    }

    log.info(`Reading from SQL DB at '${source}' with query: ${query}`)
    let db: Database.Database | undefined
    try {
      db = this.connect(source, "read")
      const statement = db.prepare(query)
      if (!statement.reader) throw new Error("Query does not return any rows")

      const columns = statement.columns().map((column) => column.name)
      const records = Array.isArray(params)
        ? statement.all(...params)
        : params
          ? statement.all(params)
          : statement.all()

      const rows = records.map((record) => {
        if (!isRecord(record)) throw new TypeError("Unexpected row shape from database")
        const row: Row = {}
        for (const column of columns) row[column] = toCell(record[column])
        return row
      })
      return new Table(columns, rows)
    } catch (e) {
      throw new IOFailureError("SQL", "read", source, e)
    } finally {
      db?.close()
    }
  }
}

/**
 * Writes a Table into a SQLite table named `target`. The database comes from the
 * `connection` option; `ifExists` decides what happens when the table is already
 * there.
 */
export class SqlWriter implements TableWriter<SqlWriteOptions> {
  constructor(private readonly connect: SqlConnector = openSqlite) {}

  async write(table: Table, target: string, options: SqlWriteOptions = {}): Promise<void> {
    const { connection } = options
    if (typeof connection !== "string" || connection.trim() === "") {
      throw new MissingArgumentError("SQL", "write", "connection")
    }
    const ifExists = options.ifExists ?? DEFAULTS.sql.ifExists

    log.info(`Writing to SQL table '${target}' (ifExists=${ifExists})...`)
    let db: Database.Database | undefined
    try {
      if (!POLICIES.includes(ifExists)) {
        throw new Error(`'${String(ifExists)}' is not a valid ifExists policy`)
      }

      db = this.connect(connection, "write")
      const name = quoteIdentifier(target)
      const exists =
        db
          .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE")
          .get(target) !== undefined
      if (exists && ifExists === "fail") throw new Error(`Table '${target}' already exists.`)

      const definitions = table.columns
        .map((column) => `${quoteIdentifier(column)} ${columnType(table.column(column))}`)
        .join(", ")
      const insert = `INSERT INTO ${name} (${table.columns.map(quoteIdentifier).join(", ")}) VALUES (${table.columns.map(() => "?").join(", ")})`

      const conn = db
      conn.transaction(() => {
        if (exists && ifExists === "replace") conn.exec(`DROP TABLE ${name}`)
        if (!exists || ifExists === "replace") conn.exec(`CREATE TABLE ${name} (${definitions})`)
        const statement = conn.prepare(insert)
        for (const values of table.toArrays()) statement.run(...values.map(toSqlValue))
      })()
    } catch (e) {
      throw new IOFailureError("SQL", "write", target, e)
    } finally {
      db?.close()
    }
  }
}

import { promises as fs } from "fs"
import { DEFAULTS } from "./config.js"
import { IOFailureError } from "./errors.js"
import Table, { type Row, toCell } from "./Table.js"
import type { JsonReadOptions, JsonWriteOptions, TableReader, TableWriter } from "./types/DataFormat.js"
import { assertSourceExists, ensureParentDirectory } from "./utils/common.js"
import { createLogger } from "./utils/logger.js"

const log = createLogger("json")

/** Parses a JSON array of flat objects. Keys become columns in first-seen order. */
export const parseJsonRecords = (text: string): Table => {
  const document: unknown = JSON.parse(text)
  if (!Array.isArray(document)) throw new TypeError("Expected a JSON array of records")

  const records: unknown[] = document
  const rows = records.map((item, idx) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new TypeError(`Record ${idx} is not a JSON object`)
    }
    const row: Row = {}
    for (const [key, value] of Object.entries(item)) row[key] = toCell(value)
    return row
  })
  return Table.fromRecords(rows)
}

/**
 * Records-oriented JSON adapter (`[{"col": value}, ...]`). Not registered out of
 * the box; opt in with:
 *
 * ```ts
 * registerReader("json", JsonReader)
 * registerWriter("json", JsonWriter)
 * ```
 */
export class JsonReader implements TableReader<JsonReadOptions> {
  async read(source: string, options: JsonReadOptions = {}): Promise<Table> {
    await assertSourceExists(source, "JSON")

    try {
      log.info(`Reading JSON from '${source}'...`)
      const text = await fs.readFile(source, { encoding: options.encoding ?? DEFAULTS.json.encoding })
      return parseJsonRecords(text)
    } catch (e) {
      throw new IOFailureError("JSON", "read", source, e)
    }
  }
}

/** Dates are written as ISO-8601 strings and read back as strings. */
export class JsonWriter implements TableWriter<JsonWriteOptions> {
  async write(table: Table, target: string, options: JsonWriteOptions = {}): Promise<void> {
    try {
      await ensureParentDirectory(target, log)
      log.info(`Writing JSON to '${target}'...`)
      const text = JSON.stringify(table.toRecords(), null, options.indent ?? DEFAULTS.json.indent)
      await fs.writeFile(target, text, { encoding: options.encoding ?? DEFAULTS.json.encoding })
    } catch (e) {
      throw new IOFailureError("JSON", "write", target, e)
    }
  }
}

import { UnknownFormatError } from "./errors.js"
import type { ReaderClass, TableReader, TableWriter, WriterClass } from "./types/DataFormat.js"
import { createLogger } from "./utils/logger.js"

const log = createLogger("registry")

/**
 * Maps format tags (e.g. `csv`, `sql`) to reader and writer strategy classes.
 * The two tables are independent: a tag may have a reader without a writer.
 * Tags are matched exactly, with no case folding or trimming.
 */
export class FormatRegistry {
  private readonly readers = new Map<string, ReaderClass>()
  private readonly writers = new Map<string, WriterClass>()

  /** Installs the reader for `format`. An existing entry is replaced. */
  registerReader(format: string, reader: ReaderClass): void {
    if (this.readers.has(format)) log.debug(`replacing reader for format '${format}'`)
    this.readers.set(format, reader)
  }

  /** Installs the writer for `format`. An existing entry is replaced. */
  registerWriter(format: string, writer: WriterClass): void {
    if (this.writers.has(format)) log.debug(`replacing writer for format '${format}'`)
    this.writers.set(format, writer)
  }

  /** Returns a new reader instance for `format`. */
  getReader(format: string): TableReader {
    const Reader = this.readers.get(format)
    if (!Reader) throw new UnknownFormatError(format, "reader")
    return new Reader()
  }

  /** Returns a new writer instance for `format`. */
  getWriter(format: string): TableWriter {
    const Writer = this.writers.get(format)
    if (!Writer) throw new UnknownFormatError(format, "writer")
    return new Writer()
  }

  hasReader(format: string): boolean {
    return this.readers.has(format)
  }

  hasWriter(format: string): boolean {
    return this.writers.has(format)
  }

  readerFormats(): string[] {
    return [...this.readers.keys()]
  }

  writerFormats(): string[] {
    return [...this.writers.keys()]
  }
}

/** Process-wide registry used by `loadData` and `saveData`. */
export const registry = new FormatRegistry()

export const registerReader = (format: string, reader: ReaderClass): void =>
  registry.registerReader(format, reader)

export const registerWriter = (format: string, writer: WriterClass): void =>
  registry.registerWriter(format, writer)

export const getReader = (format: string): TableReader => registry.getReader(format)

export const getWriter = (format: string): TableWriter => registry.getWriter(format)

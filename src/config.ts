/**
 * Default values applied by the built-in strategies when the caller leaves an
 * option out.
 */
export const DEFAULTS = {
  csv: {
    separator: ",",
    encoding: "utf8",
    header: true,
    /** Positional row index is left out of exports unless asked for. */
    writeIndex: false,
    indexLabel: "",
  },
  sql: {
    ifExists: "fail",
  },
  json: {
    encoding: "utf8",
    indent: 2,
  },
} as const

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Config {
  logLevel: LogLevel
}

const DEFAULT_LOG_LEVEL: LogLevel = "warn"

const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value)

/**
 * Reads runtime settings from the environment.
 * - `TABULAR_IO_LOG_LEVEL`: one of `LOG_LEVELS`, case-insensitive. Anything else
 *   falls back to `warn`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const level = env.TABULAR_IO_LOG_LEVEL?.trim().toLowerCase() ?? ""
  return { logLevel: isLogLevel(level) ? level : DEFAULT_LOG_LEVEL }
}

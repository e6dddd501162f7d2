import { loadConfig, LOG_LEVELS, type LogLevel } from "../config.js"

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

/** Anything with a `write` method, so tests can capture output. */
export interface LogSink {
  write(line: string): unknown
}

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level)

/**
 * Creates a logger that prefixes every line with the library name and `scope`
 * and drops messages below `level`. The level is read from the environment once,
 * when the logger is created, unless given explicitly.
 */
export const createLogger = (
  scope: string,
  level: LogLevel = loadConfig().logLevel,
  sink: LogSink = process.stderr,
): Logger => {
  const emit = (messageLevel: Exclude<LogLevel, "silent">, message: string) => {
    if (rank(messageLevel) < rank(level)) return
    sink.write(`[tabular-io] ${scope}: ${message}\n`)
  }

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  }
}

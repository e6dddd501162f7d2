/**
 * Base class for every error raised by tabular-io. Subclasses carry the context
 * (format, path, argument) needed to diagnose a failure without looking at
 * internal state.
 */
export class TabularIOError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options)
    this.name = new.target.name
  }
}

export type Role = "reader" | "writer"

/** No strategy is registered for the requested format tag and role. */
export class UnknownFormatError extends TabularIOError {
  readonly format: string
  readonly role: Role

  constructor(format: string, role: Role) {
    super(`No ${role} registered for format: '${format}'`)
    this.format = format
    this.role = role
  }
}

/** A filesystem-backed source does not exist. Raised before any read is attempted. */
export class SourceNotFoundError extends TabularIOError {
  readonly path: string

  constructor(path: string) {
    super(`The file '${path}' does not exist.`)
    this.path = path
  }
}

/** A strategy option that the format cannot work without was not supplied. */
export class MissingArgumentError extends TabularIOError {
  readonly format: string
  readonly argument: string

  constructor(format: string, operation: Operation, argument: string) {
    super(`${format} ${operation} requires a '${argument}' argument.`)
    this.format = format
    this.argument = argument
  }
}

export type Operation = "read" | "write"

/**
 * Wraps a failure from the filesystem or a parsing/database library. The
 * original error is kept as `cause`.
 */
export class IOFailureError extends TabularIOError {
  readonly target: string
  readonly operation: Operation
  readonly format: string
  declare readonly cause: Error

  constructor(format: string, operation: Operation, target: string, cause: unknown) {
    const inner = toError(cause)
    const preposition = operation === "read" ? "from" : "to"
    super(`Failed to ${operation} ${format} ${preposition} '${target}': ${inner.message}`, {
      cause: inner,
    })
    this.target = target
    this.operation = operation
    this.format = format
  }
}

/** Normalizes anything that was thrown into an `Error`. */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value))

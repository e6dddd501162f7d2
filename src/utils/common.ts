import { promises as fs } from "fs"
import path from "path"
import { IOFailureError, SourceNotFoundError } from "../errors.js"
import type { Logger } from "./logger.js"

const isMissing = (e: unknown): boolean =>
  e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR")

/**
 * True when something exists at `target`. Only "not found" style errors mean
 * false; anything else (permissions, I/O) is rethrown.
 */
export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.stat(target)
    return true
  } catch (e) {
    if (isMissing(e)) return false
    throw e
  }
}

/**
 * Fails with `SourceNotFoundError` when nothing is at `source`. A lookup that
 * fails for another reason (name too long, permissions) becomes an
 * `IOFailureError` for `format`.
 */
export const assertSourceExists = async (source: string, format: string): Promise<void> => {
  let exists: boolean
  try {
    exists = await pathExists(source)
  } catch (e) {
    throw new IOFailureError(format, "read", source, e)
  }
  if (!exists) throw new SourceNotFoundError(source)
}

/**
 * Creates the directory that will hold `file`, including missing ancestors. A
 * directory that already exists is left alone.
 */
export const ensureParentDirectory = async (file: string, log?: Logger): Promise<void> => {
  const directory = path.dirname(file)
  if (directory === "." || (await pathExists(directory))) return
  log?.info(`Creating directory: ${directory}`)
  await fs.mkdir(directory, { recursive: true })
}

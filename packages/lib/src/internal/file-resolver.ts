import * as path from "node:path"
import { stat } from "node:fs/promises"
import fg from "fast-glob"

import { StrataError, errorMessage } from "../errors.js"
import type { Logger } from "../types.js"

export interface ResolveOptions {
  cwd: string
  logger?: Logger
}

/**
 * Expands literal paths and glob patterns into a deduplicated list of paths,
 * in the order they are first seen. Paths are relative to `cwd` (absolute
 * patterns stay absolute) and use forward slashes.
 *
 * Glob matches are limited to regular files, dotfiles included. A literal
 * path is kept if anything exists at it, otherwise it is dropped with a
 * warning.
 */
export async function resolvePatterns(
  patterns: readonly string[],
  { cwd, logger }: ResolveOptions
): Promise<string[]> {
  const resolved = new Set<string>()

  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      let matches: string[]
      try {
        matches = await fg(slashes(pattern), {
          cwd,
          dot: true,
          onlyFiles: true,
          followSymbolicLinks: true,
        })
      } catch (error) {
        throw new StrataError(
          `Failed to expand pattern "${pattern}": ${errorMessage(error)}`,
          StrataError.File,
          undefined,
          { cause: error }
        )
      }
      for (const match of matches.map(normalizePath).sort()) {
        resolved.add(match)
      }
      continue
    }

    if (await pathExists(path.resolve(cwd, pattern))) {
      resolved.add(normalizePath(pattern))
    } else {
      logger?.warn?.(`Path "${pattern}" does not exist`)
    }
  }

  return [...resolved]
}

/**
 * Newest (`"max"`) or oldest (`"min"`) modification time among the given
 * paths, or undefined when none of them could be read.
 */
export async function modifiedTime(
  paths: readonly string[],
  pick: "min" | "max",
  { cwd, logger }: ResolveOptions
): Promise<number | undefined> {
  let result: number | undefined

  for (const file of paths) {
    try {
      const { mtimeMs } = await stat(path.resolve(cwd, file))
      if (
        result === undefined ||
        (pick === "max" ? mtimeMs > result : mtimeMs < result)
      ) {
        result = mtimeMs
      }
    } catch (error) {
      logger?.warn?.(`Failed to read timestamp of "${file}": ${errorMessage(error)}`)
    }
  }

  return result
}

export function normalizePath(file: string): string {
  const posix = slashes(file)
  return posix.startsWith("./") ? posix.slice(2) : posix
}

// Backslashes are separators only on Windows; elsewhere they are glob escapes.
function slashes(file: string): string {
  return process.platform === "win32" ? file.replace(/\\/g, "/") : file
}

async function pathExists(file: string): Promise<boolean> {
  try {
    await stat(file)
    return true
  } catch {
    return false
  }
}

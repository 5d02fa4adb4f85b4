import * as path from "node:path"
import { rm } from "node:fs/promises"

import { errorMessage } from "../errors.js"
import { resolvePatterns, type ResolveOptions } from "./file-resolver.js"

/**
 * Deletes whatever the output patterns resolve to, directories included.
 * Failures are logged as warnings.
 * @returns the paths that were removed
 */
export async function removeOutputs(
  patterns: readonly string[],
  options: ResolveOptions
): Promise<string[]> {
  const { cwd, logger } = options
  const removed: string[] = []

  let resolved: string[]
  try {
    resolved = await resolvePatterns(patterns, options)
  } catch (error) {
    logger?.warn?.(`Failed to resolve outputs for removal: ${errorMessage(error)}`)
    return removed
  }

  for (const file of resolved) {
    try {
      await rm(path.resolve(cwd, file), { recursive: true })
      removed.push(file)
      logger?.debug?.(`Removed output "${file}"`)
    } catch (error) {
      logger?.warn?.(`Failed to remove output "${file}": ${errorMessage(error)}`)
    }
  }

  return removed
}
